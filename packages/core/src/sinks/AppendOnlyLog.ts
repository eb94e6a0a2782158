import { createWriteStream, type WriteStream } from 'node:fs';
import { MAX_PENDING_RECORDS, SinkWriteError, getLogger } from '@hostwatch/shared';

const logger = getLogger();

export type StreamFactory = (path: string) => WriteStream;

const openForAppend: StreamFactory = (path) => createWriteStream(path, { flags: 'a' });

/**
 * A single file that is only ever appended to. Each record goes out in one
 * write so a tailing reader never sees a partial line.
 *
 * A failed write keeps its record queued; the queue is retried, oldest
 * first, before the next record is written.
 */
export class AppendOnlyLog {
  readonly path: string;
  private stream: WriteStream | null = null;
  private pending: string[] = [];
  private maxPending: number;
  private open: StreamFactory;

  constructor(path: string, options: { maxPending?: number; open?: StreamFactory } = {}) {
    this.path = path;
    this.maxPending = options.maxPending ?? MAX_PENDING_RECORDS;
    this.open = options.open ?? openForAppend;
  }

  /**
   * Queue `record` plus a trailing newline and flush the queue. Rejects with
   * {@link SinkWriteError} when the flush fails; the unwritten records
   * stay queued.
   */
  async append(record: string): Promise<void> {
    this.pending.push(`${record}\n`);

    if (this.pending.length > this.maxPending) {
      const dropped = this.pending.length - this.maxPending;
      this.pending.splice(0, dropped);
      logger.warn({ path: this.path, dropped }, 'Append queue full, dropped oldest records');
    }

    await this.flushPending();
  }

  pendingCount(): number {
    return this.pending.length;
  }

  async close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return;

    await new Promise<void>((resolve) => {
      stream.end((err?: Error | null) => {
        if (err) {
          logger.warn({ err, path: this.path }, 'Error closing append-only log');
        }
        resolve();
      });
    });

    if (this.pending.length > 0) {
      logger.warn({ path: this.path, pending: this.pending.length }, 'Closed with unwritten records');
    }
  }

  private async flushPending(): Promise<void> {
    while (this.pending.length > 0) {
      await this.write(this.pending[0]);
      this.pending.shift();
    }
  }

  private write(record: string): Promise<void> {
    const stream = this.getStream();

    return new Promise((resolve, reject) => {
      let settled = false;

      const fail = (err: unknown) => {
        if (settled) return;
        settled = true;
        stream.off('error', fail);
        this.discard(stream);
        reject(new SinkWriteError(this.path, err));
      };

      stream.once('error', fail);
      stream.write(record, (err?: Error | null) => {
        if (err) {
          fail(err);
          return;
        }
        if (settled) return;
        settled = true;
        stream.off('error', fail);
        resolve();
      });
    });
  }

  private getStream(): WriteStream {
    if (!this.stream) {
      const stream = this.open(this.path);
      stream.on('error', (err: Error) => {
        logger.debug({ err, path: this.path }, 'Append stream error');
      });
      this.stream = stream;
    }
    return this.stream;
  }

  // A stream that failed once is not reused; the next write reopens the file.
  private discard(stream: WriteStream): void {
    if (this.stream === stream) {
      this.stream = null;
    }
    stream.destroy();
  }
}
