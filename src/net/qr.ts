import QRCode from "qrcode";

/** PNG QR code of text as a data: URL, for the index page. */
export function qrDataUrl(text: string): Promise<string> {
  return QRCode.toDataURL(text, {
    margin: 2,
    scale: 6,
    color: { dark: "#000000", light: "#ffffff" },
  });
}

/** QR code drawn with block characters, for the startup banner. */
export function qrTerminal(text: string): Promise<string> {
  return QRCode.toString(text, { type: "terminal" });
}
