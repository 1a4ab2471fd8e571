export type Listener<A> = (value: A) => void;

/**
 * An explicit list of listeners for one kind of notification
 */
export class Signal<A> {
  private readonly listeners = new Array<Listener<A>>();

  constructor(public readonly name: string) {
  }

  /**
   * Add a listener, returns a function that removes it again
   */
  public connect(listener: Listener<A>): () => void {
    this.listeners.push(listener);
    return () => {
      const i = this.listeners.indexOf(listener);
      if (i > -1) { this.listeners.splice(i, 1); }
    };
  }

  public send(value: A) {
    for (const listener of [...this.listeners]) {
      listener(value);
    }
  }
}
