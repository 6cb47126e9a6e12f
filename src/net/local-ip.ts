import dgram from "node:dgram";

export const LOOPBACK = "127.0.0.1";

// Connecting a UDP socket only selects a route; no datagram is sent.
const PROBE_HOST = "8.8.8.8";
const PROBE_PORT = 80;

/** IPv4 address other devices on the LAN can reach, or loopback. */
export function getLocalIp(timeoutMs = 500): Promise<string> {
  return new Promise((resolve) => {
    const socket = dgram.createSocket("udp4");
    let settled = false;

    const finish = (ip: string) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      try {
        socket.close();
      } catch {
        // already closed after an error
      }
      resolve(ip);
    };

    const timer = setTimeout(() => finish(LOOPBACK), timeoutMs);
    socket.on("error", () => finish(LOOPBACK));
    socket.connect(PROBE_PORT, PROBE_HOST, () => {
      try {
        const { address } = socket.address();
        finish(address && address !== "0.0.0.0" ? address : LOOPBACK);
      } catch {
        finish(LOOPBACK);
      }
    });
  });
}

export function serverUrl(host: string, port: number): string {
  return `http://${host}:${port}/`;
}
