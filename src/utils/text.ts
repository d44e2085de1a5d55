import crypto from "crypto";

/** NFC, collapsed whitespace, trimmed. */
export function normalizeText(text: string): string {
  return (text ?? "").normalize("NFC").replace(/\s+/g, " ").trim();
}

export function sha256(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}
