import { readFile } from "node:fs/promises";

/**
 * Decodes hex text into bytes. Whitespace and `;` line comments are ignored,
 * so annotated dumps can be fed in directly.
 */
export const decodeHex = (text: string): Uint8Array => {
  const digits = text
    .split("\n")
    .map((line) => line.replace(/;.*$/, ""))
    .join("")
    .replace(/\s+/g, "");

  if (!/^[0-9a-fA-F]*$/.test(digits)) {
    throw new Error("hex input contains characters other than hex digits");
  }
  if (digits.length % 2 !== 0) {
    throw new Error("hex input has an odd number of digits");
  }

  const bytes = new Uint8Array(digits.length / 2);
  for (let index = 0; index < bytes.length; index += 1) {
    bytes[index] = parseInt(digits.slice(index * 2, index * 2 + 2), 16);
  }
  return bytes;
};

export const readBody = async ({
  input,
  hex,
}: {
  input: string;
  hex?: boolean;
}): Promise<Uint8Array> => {
  if (hex) return decodeHex(await readFile(input, "utf8"));
  return new Uint8Array(await readFile(input));
};
