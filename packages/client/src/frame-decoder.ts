import { createInflateRaw, type InflateRaw } from "node:zlib";

/** The empty stored block the server strips from the end of every frame. */
const SYNC_TRAILER = Buffer.from([0x00, 0x00, 0xff, 0xff]);

/**
 * Inflates binary frames of one long-lived raw-deflate stream. The server
 * never finishes its compressor, so every frame depends on the dictionary
 * built by the frames before it: calls must be made one at a time, in
 * arrival order.
 */
export class FrameDecoder {
  private inflater: InflateRaw;

  constructor() {
    this.inflater = createInflateRaw();
  }

  inflate(frame: Buffer): Promise<string> {
    const inflater = this.inflater;
    return new Promise<string>((resolve, reject) => {
      const chunks: Buffer[] = [];
      const onData = (chunk: Buffer) => {
        chunks.push(chunk);
      };
      const onError = (err: Error) => {
        inflater.off("data", onData);
        // A failed inflater cannot be resumed mid-stream
        this.reset();
        reject(err);
      };
      inflater.on("data", onData);
      inflater.once("error", onError);
      inflater.write(frame);
      inflater.write(SYNC_TRAILER);
      inflater.flush(() => {
        inflater.off("data", onData);
        inflater.off("error", onError);
        resolve(Buffer.concat(chunks).toString("utf8"));
      });
    });
  }

  reset(): void {
    const old = this.inflater;
    this.inflater = createInflateRaw();
    old.removeAllListeners("data");
    old.destroy();
  }

  close(): void {
    this.inflater.close();
  }
}
