/**
 * Text decoding helpers
 */

export type DecodedText = {
  text: string;
  encoding: "utf-8" | "latin1";
};

/**
 * Decode bytes as UTF-8, falling back to Latin-1 when they are not valid UTF-8
 *
 * A leading UTF-8 BOM is dropped.
 */
export function decodeWithFallback(bytes: Uint8Array): DecodedText {
  try {
    const text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    return { text, encoding: "utf-8" };
  } catch (err) {
    if (!(err instanceof TypeError)) {
      throw err;
    }
    return { text: Buffer.from(bytes).toString("latin1"), encoding: "latin1" };
  }
}
