import fs from "fs";
import { StringDecoder } from "string_decoder";
import * as sax from "sax";
import { CorpusUnavailableError, MalformedInputError } from "@quotegraph/core";
import { QUOTE_CONSTANTS, REDIRECT_RE } from "./constants";
import { ReaderItem } from "./types/ReaderItem";

export interface ReadPagesOptions {
  /** Bytes read per chunk from disk. */
  chunkSize?: number;
  /** Namespace holding content pages; `<ns>` values other than this are skipped. */
  contentNamespace?: string;
}

type CapturedField = "title" | "ns" | "text";

interface PageState {
  index: number;
  /** Element depth of the `<page>` tag itself. */
  depth: number;
  title: string;
  ns?: string;
  text?: string;
  redirect: boolean;
  errors: string[];
}

// characters XML 1.0 does not allow in character data
const ILLEGAL_XML_CHAR_RE = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/;
// what the decoder puts in place of a byte sequence that is not UTF-8
const REPLACEMENT_CHAR = "\uFFFD";

function localName(name: string): string {
  const colon = name.indexOf(":");
  return colon === -1 ? name : name.slice(colon + 1);
}

/**
 * Wraps a strict sax parser and turns `<page>` elements of a MediaWiki export
 * into reader items, pushed to `emit` as each page closes. XML errors inside a
 * page mark that page malformed; the parser is resumed so later pages still parse.
 */
function createPageParser(emit: (item: ReaderItem) => void, opts: ReadPagesOptions) {
  const contentNamespace = opts.contentNamespace ?? QUOTE_CONSTANTS.CONTENT_NAMESPACE;
  const parser = sax.parser(true, { trim: false, normalize: false });
  let entries = 0;
  let depth = 0;
  let page: PageState | null = null;
  // depths of pages already reported as unclosed; sax still holds them open
  const staleDepths = new Set<number>();
  let capture: CapturedField | null = null;
  let buffer = "";

  const malformed = (message: string, state: PageState | null) => {
    emit({
      kind: "malformed",
      error: new MalformedInputError(message, state ? { entry: state.index, title: state.title || undefined } : undefined),
    });
  };

  const finishPage = (state: PageState) => {
    const label = state.title || `entry #${state.index}`;
    if (state.errors.length) {
      malformed(`Malformed page "${label}": ${state.errors[0]}`, state);
      return;
    }
    if (state.ns !== undefined && state.ns !== contentNamespace) {
      emit({ kind: "skipped", title: state.title, reason: "namespace" });
      return;
    }
    if (state.redirect || (state.text !== undefined && REDIRECT_RE.test(state.text))) {
      emit({ kind: "skipped", title: state.title, reason: "redirect" });
      return;
    }
    if (state.text === undefined || !state.text.trim()) {
      emit({ kind: "skipped", title: state.title, reason: "no-text" });
      return;
    }
    if (!state.title.trim()) {
      malformed(`Page ${label} has no title`, state);
      return;
    }
    emit({ kind: "page", page: { title: state.title.trim(), rawText: state.text } });
  };

  parser.onopentag = (tag) => {
    depth++;
    const name = localName(tag.name);
    if (name === "page") {
      if (page) {
        malformed(`Page "${page.title || `entry #${page.index}`}" was not closed before the next page`, page);
        staleDepths.add(page.depth);
      }
      entries++;
      page = { index: entries, depth, title: "", redirect: false, errors: [] };
      capture = null;
      return;
    }
    if (!page) return;
    if (name === "redirect") {
      page.redirect = true;
    } else if (name === "title" || name === "ns" || name === "text") {
      capture = name;
      buffer = "";
    }
  };

  const onText = (text: string) => {
    if (page && !page.errors.length) {
      if (ILLEGAL_XML_CHAR_RE.test(text)) page.errors.push("Invalid character data");
      else if (text.includes(REPLACEMENT_CHAR)) page.errors.push("Undecodable byte sequence");
    }
    if (capture) buffer += text;
  };
  parser.ontext = onText;
  parser.oncdata = onText;

  parser.onclosetag = (tagName) => {
    const closingDepth = depth;
    depth--;
    const name = localName(tagName);
    if (page && capture === name) {
      if (name === "title") page.title = buffer;
      else if (name === "ns") page.ns = buffer.trim();
      // the last revision's text wins
      else page.text = buffer;
      capture = null;
      buffer = "";
      return;
    }
    if (name !== "page") return;
    if (page && page.depth === closingDepth) {
      const done = page;
      page = null;
      capture = null;
      finishPage(done);
    } else {
      staleDepths.delete(closingDepth);
    }
  };

  parser.onerror = (err) => {
    const message = err.message.split("\n")[0];
    // sax closing a page that was already reported as unclosed
    const closesStalePage = message === "Unexpected close tag" && staleDepths.size > 0;
    if (page) {
      page.errors.push(message);
    } else if (!closesStalePage) {
      malformed(`Malformed corpus structure: ${message}`, null);
    }
    parser.resume();
  };

  return {
    write(chunk: string) {
      parser.write(chunk);
    },
    end() {
      // errors raised while closing land on the open page, if any
      parser.close();
      const open = page;
      page = null;
      capture = null;
      if (open) {
        malformed(`Page "${open.title || `entry #${open.index}`}" is unterminated at end of input`, open);
      }
    },
  };
}

/**
 * Lazily yields one reader item per `<page>` of the export carried by `chunks`.
 * Only the page being assembled (plus pages completed by the current chunk)
 * is held in memory.
 */
export async function* readPagesFromChunks(
  chunks: AsyncIterable<string | Buffer> | Iterable<string | Buffer>,
  opts: ReadPagesOptions = {},
): AsyncGenerator<ReaderItem> {
  const queue: ReaderItem[] = [];
  const pageParser = createPageParser((item) => queue.push(item), opts);
  const decoder = new StringDecoder("utf8");

  for await (const chunk of chunks) {
    pageParser.write(typeof chunk === "string" ? chunk : decoder.write(chunk));
    yield* queue.splice(0);
  }
  const tail = decoder.end();
  if (tail) pageParser.write(tail);
  pageParser.end();
  yield* queue.splice(0);
}

/** Fails with `CorpusUnavailableError` unless `filePath` is a readable file. */
export async function assertCorpusReadable(filePath: string): Promise<void> {
  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CorpusUnavailableError(`Cannot read corpus ${filePath}: ${reason}`, error);
  }
}

/**
 * Streams pages from an export file on disk. Each call reopens the file, so
 * the sequence restarts from the first page. Failure to open or read the file
 * is fatal and surfaces as `CorpusUnavailableError`.
 */
export async function* readPages(filePath: string, opts: ReadPagesOptions = {}): AsyncGenerator<ReaderItem> {
  const stream = fs.createReadStream(filePath, { highWaterMark: opts.chunkSize ?? 64 * 1024 });
  try {
    yield* readPagesFromChunks(stream, opts);
  } catch (error) {
    if (error instanceof MalformedInputError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new CorpusUnavailableError(`Cannot read corpus ${filePath}: ${reason}`, error);
  } finally {
    stream.destroy();
  }
}
