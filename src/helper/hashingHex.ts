import crypto from "crypto";

export function sha256FromBuffer(buf: Buffer) {
  return crypto.createHash("sha256").update(buf).digest("hex");
}

export function sha256FromString(text: string) {
  return crypto.createHash("sha256").update(text, "utf8").digest("hex");
}
