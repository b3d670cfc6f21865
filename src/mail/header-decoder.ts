/**
 * Total decoding of the From/Subject/Date headers of one message.
 *
 * mailparser owns RFC 2047 (charsets, adjacent encoded words that split a
 * character). Around it: raw 8-bit header bytes are read as UTF-8, then
 * Latin-1; a block the parser rejects yields UNSUPPORTED_ENCODING.
 */
import { simpleParser, type ParsedMail } from "mailparser";
import { TextDecoder } from "node:util";
import { DecodeFailure } from "../core/errors.js";

export const UNSUPPORTED_ENCODING = "[Unsupported encoding]";

export interface DecodedHeaders {
  /** Display name, or the bare address when there is none. */
  sender: string;
  subject: string;
  /** Undecoded Date value; mailparser substitutes "now" for bad dates. */
  date: string | undefined;
}

const EMPTY: DecodedHeaders = { sender: "", subject: "", date: undefined };

export async function decodeHeaderBlock(
  block: string | Uint8Array | null | undefined
): Promise<DecodedHeaders> {
  if (!block || block.length === 0) return EMPTY;

  let parsed: ParsedMail;
  try {
    const text = typeof block === "string" ? block : decodeBytes(block);
    parsed = await simpleParser(terminateHeaders(text));
  } catch {
    return { sender: UNSUPPORTED_ENCODING, subject: UNSUPPORTED_ENCODING, date: undefined };
  }

  const from = parsed.from?.value[0];
  return {
    sender: from?.name || from?.address || "",
    subject: parsed.subject ?? "",
    date: rawHeader(parsed, "date"),
  };
}

/** Decode a single header value, e.g. an encoded Subject. */
export async function decodeHeader(raw: string | Uint8Array | null | undefined): Promise<string> {
  if (raw === null || raw === undefined || raw.length === 0) return "";

  let value: string;
  try {
    value = typeof raw === "string" ? raw : decodeBytes(raw);
  } catch {
    return UNSUPPORTED_ENCODING;
  }
  const { subject } = await decodeHeaderBlock(`Subject: ${value.replace(/\r?\n/g, " ")}`);
  return subject;
}

/** Raw header bytes: UTF-8, then Latin-1. */
export function decodeBytes(bytes: Uint8Array): string {
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder("utf-8", { fatal: true });
  } catch (err) {
    throw new DecodeFailure("UTF-8 decoder unavailable", { cause: err });
  }
  try {
    return decoder.decode(bytes);
  } catch (err) {
    if (err instanceof TypeError) return Buffer.from(bytes).toString("latin1");
    throw new DecodeFailure("Could not decode header bytes", { cause: err });
  }
}

// The parser only emits headers once it has seen the blank line after them.
function terminateHeaders(text: string): string {
  return `${text.replace(/(\r?\n)+$/, "")}\r\n\r\n`;
}

function rawHeader(parsed: ParsedMail, key: string): string | undefined {
  const line = parsed.headerLines.find((h) => h.key === key)?.line;
  if (!line) return undefined;
  const colon = line.indexOf(":");
  return colon === -1 ? undefined : line.slice(colon + 1).trim();
}
