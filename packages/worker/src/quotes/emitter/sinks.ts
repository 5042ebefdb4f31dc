import fs from "fs";
import path from "path";
import { once } from "events";
import { finished } from "stream/promises";

export interface RecordSink {
  write(chunk: string): Promise<void>;
  close(): Promise<void>;
}

export interface FileSinkOptions {
  /** Bytes buffered before `write` waits for the stream to drain. */
  highWaterMark?: number;
}

export async function createFileSink(filePath: string, opts: FileSinkOptions = {}): Promise<RecordSink> {
  await fs.promises.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
  const stream = fs.createWriteStream(filePath, { encoding: "utf8", highWaterMark: opts.highWaterMark });
  let failure: Error | null = null;
  stream.on("error", (err) => {
    failure = err;
  });
  await once(stream, "open");
  let closed = false;
  return {
    async write(chunk: string) {
      if (failure) throw failure;
      if (!stream.write(chunk)) await once(stream, "drain");
    },
    async close() {
      if (closed) return;
      closed = true;
      stream.end();
      await finished(stream);
    },
  };
}

export interface MemorySink extends RecordSink {
  readonly chunks: string[];
  readonly closed: boolean;
  text(): string;
}

export function createMemorySink(): MemorySink {
  const chunks: string[] = [];
  let closed = false;
  return {
    chunks,
    get closed() {
      return closed;
    },
    async write(chunk: string) {
      if (closed) throw new Error("write after close");
      chunks.push(chunk);
    },
    async close() {
      closed = true;
    },
    text: () => chunks.join(""),
  };
}
