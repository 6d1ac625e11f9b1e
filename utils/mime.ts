import iconv from 'iconv-lite';

const ENCODED_WORD = /=\?([^?]+)\?([bqBQ])\?([^?]*)\?=/g;

// Q-encoding: "_" is a space, "=XX" a hex byte, anything else literal
function qToBytes(text: string): Buffer {
  const bytes: number[] = [];
  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (ch === '_') {
      bytes.push(0x20);
    } else if (ch === '=' && /^[0-9a-fA-F]{2}$/.test(text.slice(i + 1, i + 3))) {
      bytes.push(parseInt(text.slice(i + 1, i + 3), 16));
      i += 2;
    } else {
      bytes.push(ch.charCodeAt(0) & 0xff);
    }
  }
  return Buffer.from(bytes);
}

function decodeWord(charset: string, encoding: string, text: string, original: string): string {
  // RFC 2231 language suffix: utf-8*en
  const cs = charset.split('*')[0].toLowerCase();
  if (!iconv.encodingExists(cs)) return original;
  const bytes = encoding.toLowerCase() === 'b' ? Buffer.from(text, 'base64') : qToBytes(text);
  return iconv.decode(bytes, cs);
}

/** Decodes RFC 2047 encoded-words in a header value such as Subject or From. */
export function decodeMimeWords(value: string): string {
  return String(value || '')
    // whitespace between two adjacent encoded-words is not part of the text
    .replace(/(\?=)\s+(=\?)/g, '$1$2')
    .replace(ENCODED_WORD, (match, charset: string, encoding: string, text: string) =>
      decodeWord(charset, encoding, text, match));
}

/** Base64url (Gmail body parts and raw messages) to UTF-8 text. */
export function decodeBase64Url(data: string): string {
  const b64 = data.replace(/-/g, '+').replace(/_/g, '/');
  return Buffer.from(b64, 'base64').toString('utf8');
}

export function encodeBase64Url(text: string): string {
  return Buffer.from(text, 'utf8')
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=+$/g, '');
}

// Non-ASCII subjects go out as a single UTF-8 B encoded-word
export function encodeHeaderUtf8(value: string): string {
  if (!/[^\x20-\x7e]/.test(value)) return value;
  return `=?UTF-8?B?${Buffer.from(value, 'utf8').toString('base64')}?=`;
}
