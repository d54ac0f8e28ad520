import { createWriteStream, WriteStream } from "node:fs";

/**
 * Opens `path` for appending and resolves once the file is open.
 *
 * Errors after that point, such as a failed write, go to `onFailure`; the
 * stream keeps that listener for its lifetime.
 *
 * @throws Error naming the path if the file cannot be opened
 */
export function openLogStream(path: string, onFailure: (error: Error) => void): Promise<WriteStream> {
  const stream = createWriteStream(path, { flags: "a" });

  return new Promise<WriteStream>((resolve, reject) => {
    const onOpen = () => {
      stream.off("error", onOpenError);
      stream.on("error", onFailure);
      resolve(stream);
    };
    const onOpenError = (error: Error) => {
      stream.off("open", onOpen);
      reject(new Error(`cannot open log file ${path}: ${error.message}`));
    };

    stream.once("open", onOpen);
    stream.once("error", onOpenError);
  });
}
