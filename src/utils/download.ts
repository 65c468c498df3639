import { createWriteStream } from "node:fs";
import { stat } from "node:fs/promises";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { AxiosInstance } from "axios";
import cliProgress from "cli-progress";

export interface DownloadOutcome {
  status: "downloaded" | "skipped";
  path: string;
  bytes: number;
}

export interface DownloadOptions {
  /** Draw a progress bar on stderr. */
  progress?: boolean;
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && "code" in err ? err.code : undefined;
}

async function existingSize(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).size;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return undefined;
    throw err;
  }
}

/**
 * Stream `url` into `dest`. A file already at `dest` whose size equals the
 * response's content-length is left alone; its content is not compared.
 */
export async function downloadFile(
  http: AxiosInstance,
  url: string,
  dest: string,
  options: DownloadOptions = {}
): Promise<DownloadOutcome> {
  const res = await http.get<Readable>(url, {
    responseType: "stream",
    maxRedirects: 5,
  });
  const total = Number(res.headers["content-length"] ?? 0);

  if ((await existingSize(dest)) === total) {
    res.data.destroy();
    console.log(`File ${dest} already downloaded`);
    return { status: "skipped", path: dest, bytes: total };
  }

  const bar = options.progress
    ? new cliProgress.SingleBar(
        { format: `${dest} [{bar}] {percentage}% | {value}/{total} B` },
        cliProgress.Presets.shades_classic
      )
    : undefined;
  bar?.start(total, 0);

  let bytes = 0;
  try {
    await pipeline(
      res.data,
      async function* (source: AsyncIterable<Buffer>) {
        for await (const chunk of source) {
          bytes += chunk.length;
          bar?.increment(chunk.length);
          yield chunk;
        }
      },
      createWriteStream(dest)
    );
  } finally {
    bar?.stop();
  }
  return { status: "downloaded", path: dest, bytes };
}
