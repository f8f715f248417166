// RFC 9285 alphabet; every character is valid in QR alphanumeric mode.
const CHARS = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ $%*+-./:";

const lookup = new Map<string, number>();
for (let i = 0; i < CHARS.length; i++) {
  lookup.set(CHARS[i], i);
}

export function encodeBase45(bytes: Uint8Array): string {
  let result = "";
  for (let i = 0; i < bytes.length; i += 2) {
    if (i + 1 < bytes.length) {
      let n = bytes[i] * 256 + bytes[i + 1];
      const c = n % 45;
      n = (n - c) / 45;
      const d = n % 45;
      const e = (n - d) / 45;
      result += CHARS[c] + CHARS[d] + CHARS[e];
    } else {
      const n = bytes[i];
      const c = n % 45;
      const d = (n - c) / 45;
      result += CHARS[c] + CHARS[d];
    }
  }
  return result;
}

function digit(char: string): number {
  const value = lookup.get(char);
  if (value === undefined) {
    throw new Error(`invalid base45 character '${char}'`);
  }
  return value;
}

export function decodeBase45(text: string): Uint8Array {
  if (text.length % 3 === 1) {
    throw new Error(`invalid base45 length: ${text.length}`);
  }
  const out: number[] = [];
  for (let i = 0; i < text.length; i += 3) {
    if (i + 2 < text.length) {
      const n = digit(text[i]) + digit(text[i + 1]) * 45 + digit(text[i + 2]) * 45 * 45;
      if (n > 0xffff) throw new Error("invalid base45 triplet");
      out.push(n >> 8, n & 0xff);
    } else {
      const n = digit(text[i]) + digit(text[i + 1]) * 45;
      if (n > 0xff) throw new Error("invalid base45 pair");
      out.push(n);
    }
  }
  return Uint8Array.from(out);
}
