/** Minimal typed event emitter shared by the transports. */
export class EventEmitter<
  T extends Record<string, unknown[]> = Record<string, unknown[]>,
> {
  #listeners: { [K in keyof T]?: Array<(...args: T[K]) => void> } = {};

  on<K extends keyof T>(event: K, listener: (...args: T[K]) => void) {
    const eventListeners = this.#listeners[event] ?? [];
    eventListeners.push(listener);
    this.#listeners[event] = eventListeners;
  }

  /** Register a listener that is removed after its first call. */
  once<K extends keyof T>(event: K, listener: (...args: T[K]) => void) {
    const wrapper = (...args: T[K]) => {
      this.off(event, wrapper);
      listener(...args);
    };
    this.on(event, wrapper);
  }

  off<K extends keyof T>(event: K, listener: (...args: T[K]) => void) {
    const eventListeners = this.#listeners[event];
    if (eventListeners) {
      const index = eventListeners.indexOf(listener);
      if (index !== -1) {
        eventListeners.splice(index, 1);
      }
    }
  }

  removeAllListeners(event?: keyof T) {
    if (event === undefined) {
      this.#listeners = {};
    } else {
      delete this.#listeners[event];
    }
  }

  emit<K extends keyof T>(event: K, ...args: T[K]) {
    const eventListeners = this.#listeners[event];
    if (eventListeners) {
      // Copy so `once` listeners can detach while iterating.
      [...eventListeners].forEach((listener) => {
        listener(...args);
      });
    }
  }
}
