import { randomBytes } from '@noble/hashes/utils';

/** A byte buffer that overwrites itself with random bytes when disposed (with `using`). */
export class WipeableBytes extends Uint8Array {
  /** Decode the bytes as UTF-8 text. The returned string cannot be wiped. */
  toText(): string {
    return new TextDecoder().decode(this);
  }

  [Symbol.dispose](): void {
    this.set(randomBytes(this.length));
  }
}

/**
 * Holds a text secret XORed with a random pad of the same length, so the
 * plain UTF-8 bytes only exist in memory while a `reveal()` result is alive.
 *
 * The original string passed to the constructor stays in the JS heap until it
 * is collected; this only keeps long-lived copies obscured.
 */
export class SecretText {
  readonly #data: Uint8Array;
  readonly #pad: Uint8Array;

  constructor(text: string) {
    this.#data = new TextEncoder().encode(text);
    this.#pad = new Uint8Array(randomBytes(this.#data.length));

    for (let i = 0; i < this.#data.length; i++) {
      this.#data[i] ^= this.#pad[i];
    }
  }

  get byteLength(): number {
    return this.#data.length;
  }

  /** Get the plain bytes. Supports the `using` keyword to wipe them after use. */
  reveal(): WipeableBytes {
    const bytes = new WipeableBytes(this.#data.length);

    for (let i = 0; i < bytes.length; i++) {
      bytes[i] = this.#data[i] ^ this.#pad[i];
    }

    return bytes;
  }

  [Symbol.dispose](): void {
    this.#pad.set(randomBytes(this.#pad.length));
    this.#data.set(randomBytes(this.#data.length));
  }
}
