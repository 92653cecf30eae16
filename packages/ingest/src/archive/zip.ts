import { createWriteStream } from "node:fs";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import yauzl from "yauzl";

export interface ExtractResult {
  entries: string[];
  bytes: number;
}

function openZip(path: string): Promise<yauzl.ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(path, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
      if (err || !zipfile) reject(err ?? new Error(`Unable to open archive: ${path}`));
      else resolve(zipfile);
    });
  });
}

function nextEntry(zipfile: yauzl.ZipFile): Promise<yauzl.Entry | null> {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      zipfile.off("entry", onEntry);
      zipfile.off("end", onEnd);
      zipfile.off("error", onError);
    };
    const onEntry = (entry: yauzl.Entry) => {
      cleanup();
      resolve(entry);
    };
    const onEnd = () => {
      cleanup();
      resolve(null);
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };

    zipfile.on("entry", onEntry);
    zipfile.on("end", onEnd);
    zipfile.on("error", onError);
    zipfile.readEntry();
  });
}

function openEntryStream(zipfile: yauzl.ZipFile, entry: yauzl.Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || !stream) reject(err ?? new Error(`Unable to read entry: ${entry.fileName}`));
      else resolve(stream);
    });
  });
}

async function* matchingEntries(
  zipfile: yauzl.ZipFile,
  suffix: string,
  names: string[]
): AsyncGenerator<Buffer> {
  for (let entry = await nextEntry(zipfile); entry; entry = await nextEntry(zipfile)) {
    if (entry.fileName.endsWith("/") || !entry.fileName.endsWith(suffix)) continue;

    yield* await openEntryStream(zipfile, entry);
    names.push(entry.fileName);
  }
}

/**
 * Writes every entry whose name ends in `suffix` to `destPath`, one after
 * another, in archive order. Equivalent to `unzip -p archive "*<suffix>"`.
 */
export async function extractEntries(
  zipPath: string,
  destPath: string,
  suffix: string
): Promise<ExtractResult> {
  const zipfile = await openZip(zipPath);
  const out = createWriteStream(destPath);
  const entries: string[] = [];

  try {
    await pipeline(matchingEntries(zipfile, suffix, entries), out);
  } finally {
    zipfile.close();
  }

  return { entries, bytes: out.bytesWritten };
}
