// src/lib/serial-queue.ts
// Runs async tasks one at a time in submission order

export class SerialQueue {
  private chain: Promise<void> = Promise.resolve();

  async run<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.chain;
    this.chain = previous.then(() => gate);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
