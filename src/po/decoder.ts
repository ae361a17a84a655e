export interface DecodedLine {
  text: string;
  /** True when some bytes were invalid for the encoding and got replaced. */
  invalid: boolean;
}

export interface LineDecoder {
  /** Canonical name of the encoding, e.g. `utf-8`, `iso-8859-2`. */
  readonly encoding: string;
  decode(bytes: Uint8Array): DecodedLine;
}

/**
 * Build a decoder for a charset label, or null when the runtime does not
 * know the label.
 */
export function createLineDecoder(label: string): LineDecoder | null {
  let strict: TextDecoder;
  let lossy: TextDecoder;
  try {
    strict = new TextDecoder(label.trim(), { fatal: true });
    lossy = new TextDecoder(label.trim());
  } catch (err) {
    if (err instanceof RangeError) return null;
    throw err;
  }

  return {
    encoding: strict.encoding,
    decode(bytes) {
      if (isAscii(bytes)) {
        return { text: asciiToString(bytes), invalid: false };
      }
      try {
        return { text: strict.decode(bytes), invalid: false };
      } catch (err) {
        if (!(err instanceof TypeError)) throw err;
        return { text: lossy.decode(bytes), invalid: true };
      }
    },
  };
}

function isAscii(bytes: Uint8Array): boolean {
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] > 0x7f) return false;
  }
  return true;
}

function asciiToString(bytes: Uint8Array): string {
  let text = "";
  const chunk = 0x2000;
  for (let i = 0; i < bytes.length; i += chunk) {
    text += String.fromCharCode(...bytes.subarray(i, i + chunk));
  }
  return text;
}
