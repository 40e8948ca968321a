import { BlockFramer } from '../src/framers/block-framer.js';
import { Transport } from '../src/types/boiler-types.js';

/** Returns the raw reply bytes for a request frame, or null to stay silent */
export type Responder = (request: Uint8Array) => Uint8Array | null;

const codec = new BlockFramer();

/** Answers every frame with a frame carrying the same command and payload */
export const echoResponder: Responder = request => {
  const { command, payload } = codec.decode(request, { validateChecksum: true });
  return codec.encode(command, payload);
};

export const replyWith =
  (payload: number[] | Uint8Array): Responder =>
  request => {
    const { command } = codec.decode(request);
    return codec.encode(command, Uint8Array.from(payload));
  };

export const silentResponder: Responder = () => null;

/**
 * In-process stand-in for a controller on the other end of the serial line.
 *
 * Tracks how many requests are outstanding: a request counts from the moment it is
 * written until its reply has been read off completely (or immediately stops counting
 * when the controller stays silent).
 */
export class FakeController implements Transport {
  isOpen = false;
  readonly written: Uint8Array[] = [];
  inFlight = 0;
  maxInFlight = 0;
  failWrites = false;
  /** Writes never complete, like a port that never drains */
  stallWrites = false;
  failConnect = false;
  delayMs: number;

  private rx: number[] = [];
  private waiters: Array<() => void> = [];

  constructor(
    private responder: Responder = echoResponder,
    options: { delayMs?: number } = {}
  ) {
    this.delayMs = options.delayMs ?? 0;
  }

  setResponder(responder: Responder): void {
    this.responder = responder;
  }

  /** Puts bytes on the line without a request, e.g. noise left over from earlier */
  inject(bytes: number[]): void {
    this.rx.push(...bytes);
    this.wake();
  }

  get buffered(): number {
    return this.rx.length;
  }

  async connect(): Promise<void> {
    if (this.failConnect) throw new Error('cannot open fake port');
    this.isOpen = true;
  }

  async disconnect(): Promise<void> {
    this.isOpen = false;
  }

  async flush(): Promise<void> {
    this.rx = [];
  }

  async write(buffer: Uint8Array): Promise<void> {
    if (this.failWrites) throw new Error('write failed');
    if (this.stallWrites) return new Promise<void>(() => {});
    const request = Uint8Array.from(buffer);
    this.written.push(request);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    const reply = this.responder(request);
    if (reply === null) {
      this.inFlight--;
      return;
    }
    const deliver = (): void => {
      this.rx.push(...reply);
      this.wake();
    };
    if (this.delayMs > 0) setTimeout(deliver, this.delayMs);
    else deliver();
  }

  async read(length: number, timeout: number = 1000): Promise<Uint8Array> {
    const deadline = Date.now() + timeout;
    while (this.rx.length < length) {
      const left = deadline - Date.now();
      if (left <= 0) break;
      await new Promise<void>(resolve => {
        const timer = setTimeout(resolve, left);
        this.waiters.push(() => {
          clearTimeout(timer);
          resolve();
        });
      });
    }
    const data = Uint8Array.from(this.rx.splice(0, length));
    if (data.length > 0 && this.rx.length === 0 && this.inFlight > 0) {
      this.inFlight--;
    }
    return data;
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach(w => w());
  }
}
