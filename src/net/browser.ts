import { spawn } from "node:child_process";

export interface OpenCommand {
  command: string;
  args: string[];
}

export function browserCommand(url: string, platform: NodeJS.Platform = process.platform): OpenCommand {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [url] };
    case "win32":
      // start treats its first quoted argument as the window title.
      return { command: "cmd", args: ["/c", "start", "", url] };
    default:
      return { command: "xdg-open", args: [url] };
  }
}

/** Opens url in the desktop browser. Launch failures are logged only. */
export function openBrowser(url: string): void {
  const { command, args } = browserCommand(url);
  const child = spawn(command, args, { stdio: "ignore", detached: true });
  child.on("error", (err) => {
    console.warn(`WARN: could not open a browser (${command}): ${err.message}`);
  });
  child.unref();
}
