export interface ObserverClient<T> {
  registerListener(listener: Partial<T>): () => void;
}

type Registration<T> = {
  listener: Partial<T>;
};

/**
 * Each registration is removed by its own disposer, also when the same listener
 * object was registered more than once.
 */
export class BaseObserver<T> implements ObserverClient<T> {
  private registrations = new Set<Registration<T>>();

  registerListener(listener: Partial<T>): () => void {
    const registration: Registration<T> = { listener };
    this.registrations.add(registration);
    return () => {
      this.registrations.delete(registration);
    };
  }

  get listenerCount() {
    return this.registrations.size;
  }

  protected iterateListeners(cb: (listener: Partial<T>) => void) {
    // Listeners may unregister while being notified
    for (const { listener } of [...this.registrations]) {
      cb(listener);
    }
  }
}
