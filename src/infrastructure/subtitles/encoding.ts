import { detect } from "chardet";
import iconv from "iconv-lite";

const BOMS: Array<[number[], string]> = [
  [[0xef, 0xbb, 0xbf], "utf-8"],
  [[0xff, 0xfe], "utf-16le"],
  [[0xfe, 0xff], "utf-16be"]
];

const SNIFF_BYTES = 512;

// Mostly-ASCII UTF-16 puts a NUL in every other byte: odd offsets for LE, even for BE.
function sniffUtf16(buffer: Buffer) {
  const length = Math.min(buffer.length, SNIFF_BYTES) & ~1;
  const pairs = length / 2;
  if (pairs < 2) {
    return null;
  }
  let evenZeros = 0;
  let oddZeros = 0;
  for (let index = 0; index < length; index += 2) {
    if (buffer[index] === 0) {
      evenZeros += 1;
    }
    if (buffer[index + 1] === 0) {
      oddZeros += 1;
    }
  }
  if (oddZeros >= pairs * 0.4 && evenZeros <= pairs * 0.1) {
    return "utf-16le";
  }
  if (evenZeros >= pairs * 0.4 && oddZeros <= pairs * 0.1) {
    return "utf-16be";
  }
  return null;
}

export function detectEncoding(buffer: Buffer) {
  for (const [bom, encoding] of BOMS) {
    if (bom.every((byte, index) => buffer[index] === byte)) {
      return encoding;
    }
  }
  const utf16 = sniffUtf16(buffer);
  if (utf16) {
    return utf16;
  }
  const detected = detect(buffer)?.toLowerCase();
  if (!detected) {
    return "utf-8";
  }
  if (detected.startsWith("utf-16")) {
    return detected;
  }
  return iconv.encodingExists(detected) ? detected : "utf-8";
}

/** Decodes subtitle bytes to text; iconv-lite strips a leading BOM. */
export function decodeSubtitle(buffer: Buffer) {
  const encoding = detectEncoding(buffer);
  return { encoding, text: iconv.decode(buffer, encoding) };
}
