import fsp from "fs/promises";

export interface LogStat {
  size: number;
  /** File identity; 0 when the platform does not report one */
  ino: number;
}

export interface LogHandle {
  stat(): Promise<LogStat>;
  /** Positional read into `buffer`, resolving to the number of bytes read */
  read(buffer: Buffer, position: number): Promise<number>;
  close(): Promise<void>;
}

/** What the tailer needs from the file system */
export interface LogSource {
  stat(path: string): Promise<LogStat>;
  open(path: string): Promise<LogHandle>;
}

export const nodeLogSource: LogSource = {
  async stat(path) {
    const stat = await fsp.stat(path);
    return { size: stat.size, ino: stat.ino };
  },
  async open(path) {
    const handle = await fsp.open(path, "r");
    return {
      async stat() {
        const stat = await handle.stat();
        return { size: stat.size, ino: stat.ino };
      },
      async read(buffer, position) {
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
        return bytesRead;
      },
      close: () => handle.close(),
    };
  },
};

const NEWLINE = 0x0a;
export const TAIL_CHUNK_BYTES = 64 * 1024;

export interface LineBatch {
  lines: string[];
  /** Offset just past the last newline consumed; equals `start` when none was found */
  end: number;
}

/**
 * Read every newline-terminated line in [start, limit). A trailing fragment
 * without a newline is left for the next read.
 */
export async function readCompleteLines(
  handle: LogHandle,
  start: number,
  limit: number,
  chunkBytes: number = TAIL_CHUNK_BYTES
): Promise<LineBatch> {
  const lines: string[] = [];
  let end = start;
  let position = start;
  let carry: Buffer = Buffer.alloc(0);
  while (position < limit) {
    const chunk = Buffer.alloc(Math.min(chunkBytes, limit - position));
    const bytesRead = await handle.read(chunk, position);
    if (bytesRead <= 0) break;
    position += bytesRead;
    const data =
      carry.length > 0
        ? Buffer.concat([carry, chunk.subarray(0, bytesRead)])
        : chunk.subarray(0, bytesRead);
    // `data` always starts at `end`, the first unconsumed byte
    let lineStart = 0;
    let newline = data.indexOf(NEWLINE, lineStart);
    while (newline !== -1) {
      lines.push(data.subarray(lineStart, newline).toString("utf8"));
      lineStart = newline + 1;
      newline = data.indexOf(NEWLINE, lineStart);
    }
    end += lineStart;
    carry = data.subarray(lineStart);
  }
  return { lines, end };
}
