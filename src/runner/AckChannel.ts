/**
 * One-way, in-order message channel. `post` never blocks the sender; messages are
 * handled one after another on the receiving side. A handler failure stops further
 * handling and is rethrown by every later `drain`.
 */
export class AckChannel<T> {
  private tail: Promise<void> = Promise.resolve();
  private failure: { error: unknown } | null = null;

  constructor(private readonly handler: (message: T) => void | Promise<void>) {}

  post(message: T): void {
    this.tail = this.tail.then(async () => {
      try {
        if (!this.failure) await this.handler(message);
      } catch (error) {
        this.failure = { error };
      }
    });
  }

  async drain(): Promise<void> {
    await this.tail;
    if (this.failure) throw this.failure.error;
  }
}
