import { createLineDecoder, type LineDecoder } from "./decoder.js";
import { unescapePo } from "./escape.js";
import { EMPTY_HEADER, parseHeader } from "./header.js";
import type {
  Catalog,
  CatalogHeader,
  Entry,
  FormatLanguage,
  Fragment,
  Message,
  SyntaxIssue,
} from "./entry.js";
import { EncodingError } from "../utils/errors.js";

export interface ParseOptions {
  /** Force an encoding instead of the header's charset. */
  encoding?: string;
}

interface MessageBuilder {
  line: number;
  value: string;
  fragments: Fragment[];
}

interface EntryBuilder {
  started: boolean;
  line: number;
  firstText: string;
  keywords: string[];
  fuzzy: boolean;
  obsolete: boolean;
  noqa: boolean;
  noqaRules: string[];
  noWrap: boolean;
  format: FormatLanguage | null;
  encodingError: boolean;
  msgctxt: MessageBuilder | null;
  msgid: MessageBuilder | null;
  msgidPlural: MessageBuilder | null;
  msgstr: Map<number, MessageBuilder>;
}

type Slot = "msgctxt" | "msgid" | "msgid_plural" | number;

const KEYWORD = /^(msgctxt|msgid_plural|msgid|msgstr(?:\[([^\]]*)\])?)(?=[\s"]|$)/;

const FORMAT_LANGUAGES: Record<string, FormatLanguage> = {
  c: "c",
  python: "python",
  "python-brace": "python-brace",
};

/**
 * Parse the raw bytes of a PO file.
 *
 * Strings are decoded as UTF-8 until the header entry declares another
 * charset. Syntax problems are collected on the catalog and parsing goes on
 * with the next line.
 *
 * @throws EncodingError when `options.encoding` names an unknown encoding
 */
export function parseCatalog(data: Uint8Array, options: ParseOptions = {}): Catalog {
  let decoder = resolveDecoder(options.encoding);
  const encodingFixed = options.encoding !== undefined;

  const entries: Entry[] = [];
  const syntaxErrors: SyntaxIssue[] = [];
  let header: CatalogHeader = {
    ...EMPTY_HEADER,
    encoding: decoder.encoding,
    charsetSupported: true,
  };
  let headerSeen = false;

  let current = newBuilder();
  let slot: Slot | null = null;
  let lineNo = 0;
  let lineText = "";

  const issue = (message: string, line = lineNo, text = lineText) => {
    syntaxErrors.push({ line, message, text });
  };

  const begin = () => {
    if (current.started) return;
    current.started = true;
    current.line = lineNo;
    current.firstText = lineText;
  };

  const finish = () => {
    if (current.started) {
      const entry = buildEntry(current, issue);
      if (entry) {
        entries.push(entry);
        if (!headerSeen && entry.msgid.value === "" && !entry.obsolete) {
          headerSeen = true;
          header = readHeader(entry);
        }
      }
    }
    current = newBuilder();
    slot = null;
  };

  const readHeader = (entry: Entry): CatalogHeader => {
    const info = parseHeader(entry.msgstr.get(0)?.value ?? "");
    let charsetSupported = true;
    if (!encodingFixed && info.charset) {
      const declared = createLineDecoder(info.charset);
      if (declared) {
        decoder = declared;
      } else {
        charsetSupported = false;
      }
    }
    return { ...info, encoding: decoder.encoding, charsetSupported };
  };

  const slotMessage = (target: Slot | null): MessageBuilder | null => {
    if (target === null) return null;
    if (target === "msgctxt") return current.msgctxt;
    if (target === "msgid") return current.msgid;
    if (target === "msgid_plural") return current.msgidPlural;
    return current.msgstr.get(target) ?? null;
  };

  const appendString = (msg: MessageBuilder, body: string, from: number, offset: number) => {
    const first = body.indexOf('"', from);
    if (first < 0) {
      issue("missing quoted string");
      return;
    }
    const last = body.lastIndexOf('"');
    let raw: string;
    if (last === first) {
      issue("unterminated string");
      raw = body.slice(first + 1);
    } else {
      raw = body.slice(first + 1, last);
    }

    const { value, issues } = unescapePo(raw);
    for (const problem of issues) {
      if (problem.kind === "unknown-escape") {
        issue(`unknown escape sequence '${problem.sequence}'`);
      } else if (last !== first) {
        issue("unterminated string");
      }
    }

    msg.fragments.push({
      line: lineNo,
      column: offset + first + 1,
      raw,
      start: msg.value.length,
      end: msg.value.length + value.length,
    });
    msg.value += value;
  };

  const parseMessage = (body: string, offset: number) => {
    const match = KEYWORD.exec(body);
    if (!match) {
      begin();
      if (body.startsWith('"')) {
        const target = slotMessage(slot);
        if (target) {
          appendString(target, body, 0, offset);
        } else {
          issue("string without keyword");
        }
      } else {
        issue(`unknown keyword '${body.split(/[\s"]/)[0]}'`);
      }
      return;
    }

    const keyword = match[1];
    if ((keyword === "msgctxt" || keyword === "msgid") && current.msgstr.size > 0) {
      finish();
    }
    begin();

    let target: Slot;
    if (keyword === "msgctxt" || keyword === "msgid" || keyword === "msgid_plural") {
      target = keyword;
    } else if (match[2] === undefined) {
      target = 0;
    } else if (/^\d+$/.test(match[2])) {
      target = parseInt(match[2], 10);
    } else {
      issue(`invalid plural index '${match[2]}'`);
      slot = null;
      return;
    }

    if (slotMessage(target)) issue(`duplicate keyword '${keyword}'`);
    const msg: MessageBuilder = { line: lineNo, value: "", fragments: [] };
    if (target === "msgctxt") current.msgctxt = msg;
    else if (target === "msgid") current.msgid = msg;
    else if (target === "msgid_plural") current.msgidPlural = msg;
    else current.msgstr.set(target, msg);
    slot = target;

    appendString(msg, body, match[0].length, offset);
  };

  for (const bytes of splitLines(data)) {
    lineNo++;
    const { text, invalid } = decoder.decode(bytes);
    lineText = text;

    if (text.trim() === "") {
      finish();
      continue;
    }

    if (text.startsWith("#,") || text.startsWith("#=")) {
      if (current.msgstr.size > 0) finish();
      begin();
      parseKeywords(text.slice(2), current);
    } else if (text.startsWith("#~ ")) {
      const body = text.slice(3);
      const hasFields = current.msgid !== null || current.msgctxt !== null;
      if (current.msgstr.size > 0 && /^msg(ctxt|id)\b/.test(body)) {
        finish();
      } else if (hasFields && !current.obsolete && !body.startsWith('"')) {
        finish();
      }
      begin();
      current.obsolete = true;
      parseMessage(body, 3);
    } else if (text.startsWith("#")) {
      if (current.msgstr.size > 0) finish();
      begin();
    } else if (text.startsWith("msg") || text.startsWith('"')) {
      parseMessage(text, 0);
    } else {
      begin();
      issue("unexpected line");
    }

    if (invalid) current.encodingError = true;
  }
  finish();

  return Object.freeze({
    entries: Object.freeze(entries),
    header: Object.freeze(header),
    syntaxErrors: Object.freeze(syntaxErrors),
  });
}

function resolveDecoder(label: string | undefined): LineDecoder {
  const decoder = createLineDecoder(label ?? "utf-8");
  if (!decoder) throw new EncodingError(label ?? "utf-8");
  return decoder;
}

/** Split on LF, dropping a CR right before it. */
export function* splitLines(data: Uint8Array): Generator<Uint8Array> {
  let start = 0;
  while (start < data.length) {
    let end = data.indexOf(0x0a, start);
    if (end < 0) end = data.length;
    const stop = end > start && data[end - 1] === 0x0d ? end - 1 : end;
    yield data.subarray(start, stop);
    start = end + 1;
  }
}

function newBuilder(): EntryBuilder {
  return {
    started: false,
    line: 0,
    firstText: "",
    keywords: [],
    fuzzy: false,
    obsolete: false,
    noqa: false,
    noqaRules: [],
    noWrap: false,
    format: null,
    encodingError: false,
    msgctxt: null,
    msgid: null,
    msgidPlural: null,
    msgstr: new Map(),
  };
}

function parseKeywords(text: string, builder: EntryBuilder): void {
  for (const part of text.split(",")) {
    const keyword = part.trim();
    if (keyword === "") continue;
    builder.keywords.push(keyword);

    if (keyword === "fuzzy") {
      builder.fuzzy = true;
    } else if (keyword === "noqa") {
      builder.noqa = true;
    } else if (keyword.startsWith("noqa:")) {
      builder.noqaRules = keyword
        .slice(5)
        .split(";")
        .map((rule) => rule.trim())
        .filter((rule) => rule.length > 0);
    } else if (keyword === "no-wrap") {
      builder.noWrap = true;
    } else if (keyword.endsWith("-format")) {
      // the last format flag wins; `no-c-format` clears an earlier `c-format`
      builder.format = keyword.startsWith("no-")
        ? null
        : (FORMAT_LANGUAGES[keyword.slice(0, -7)] ?? null);
    }
  }
}

function freezeMessage(msg: MessageBuilder | null): Message | null {
  if (!msg) return null;
  return Object.freeze({
    value: msg.value,
    line: msg.line,
    fragments: Object.freeze(msg.fragments.map((f) => Object.freeze(f))),
  });
}

function buildEntry(
  builder: EntryBuilder,
  issue: (message: string, line?: number, text?: string) => void
): Entry | null {
  const msgid = freezeMessage(builder.msgid);
  if (!msgid) {
    if (builder.msgctxt || builder.msgidPlural || builder.msgstr.size > 0) {
      issue("entry without msgid", builder.line, builder.firstText);
    }
    return null;
  }

  const msgstr = new Map<number, Message>();
  const indexes = [...builder.msgstr.keys()].sort((a, b) => a - b);
  for (const index of indexes) {
    const msg = freezeMessage(builder.msgstr.get(index) ?? null);
    if (msg) msgstr.set(index, msg);
  }

  return Object.freeze({
    line: builder.line,
    keywords: Object.freeze([...builder.keywords]),
    fuzzy: builder.fuzzy,
    obsolete: builder.obsolete,
    noqa: builder.noqa,
    noqaRules: Object.freeze([...builder.noqaRules]),
    noWrap: builder.noWrap,
    format: builder.format,
    encodingError: builder.encodingError,
    msgctxt: freezeMessage(builder.msgctxt),
    msgid,
    msgidPlural: freezeMessage(builder.msgidPlural),
    msgstr,
  });
}
