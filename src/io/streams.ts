import { once } from "node:events";
import { createWriteStream as fsCreateWriteStream } from "node:fs";
import type { WriteStream } from "node:fs";
import type { Writable } from "node:stream";

const WRITE_HIGH_WATER_MARK = 16 * 1024;

const abortError = () => new Error("Operation aborted");

const attachAbortHandler = (stream: WriteStream, signal?: AbortSignal): void => {
  if (!signal) {
    return;
  }

  if (signal.aborted) {
    stream.destroy(abortError());
    return;
  }

  signal.addEventListener(
    "abort",
    () => {
      stream.destroy(abortError());
    },
    { once: true }
  );
};

export const createWriteStream = (path: string, signal?: AbortSignal): WriteStream => {
  const stream = fsCreateWriteStream(path, {
    highWaterMark: WRITE_HIGH_WATER_MARK,
    signal,
  });

  attachAbortHandler(stream, signal);
  return stream;
};

/**
 * Rejects with `message` once `stream` emits `error`. Race it against writes
 * so a failing stream cannot leave them waiting for `drain` or `finish`.
 */
export const watchStreamError = (
  stream: NodeJS.ReadableStream | NodeJS.WritableStream,
  message: string,
  cleanup: Array<() => void>
): Promise<never> =>
  new Promise((_, reject) => {
    const onError = (error: Error) => {
      reject(new Error(`${message}: ${error.message}`));
    };
    stream.once("error", onError);
    cleanup.push(() => stream.off("error", onError));
  });

/** Writes `value` as one line of JSON, waiting for the stream to drain when it asks to. */
export const writeJsonLine = async (stream: Writable, value: unknown): Promise<void> => {
  if (!stream.write(`${JSON.stringify(value)}\n`)) {
    await once(stream, "drain");
  }
};

export const endStream = async (stream: Writable): Promise<void> => {
  stream.end();
  await once(stream, "finish");
};
