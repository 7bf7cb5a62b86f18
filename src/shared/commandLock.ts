/**
 * File d'exécution où une seule tâche est active à la fois (FIFO).
 *
 * `run()` met en file; `tryRun()` refuse si quoi que ce soit est en cours ou en
 * attente (utilisé par le polling, moins prioritaire que les commandes).
 */
export class LockClosedError extends Error {
  constructor() {
    super("Verrou fermé: aucune nouvelle tâche acceptée");
    this.name = "LockClosedError";
  }
}

const noop = (): void => {};

export class CommandLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private closed = false;

  /** Nombre de tâches en cours ou en attente. */
  get depth(): number {
    return this.pending;
  }

  get busy(): boolean {
    return this.pending > 0;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Met `task` en file; la promesse retournée suit le résultat de la tâche. */
  run<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) return Promise.reject(new LockClosedError());
    this.pending += 1;
    const result = this.tail.then(task);
    this.tail = result.then(noop, noop).then(() => {
      this.pending -= 1;
    });
    return result;
  }

  /** Exécute `task` seulement si le verrou est libre, sinon retourne null. */
  tryRun<T>(task: () => Promise<T>): Promise<T> | null {
    if (this.closed || this.busy) return null;
    return this.run(task);
  }

  /** Refuse les nouvelles tâches et attend la fin de celles déjà en file. */
  async close(): Promise<void> {
    this.closed = true;
    await this.tail;
  }
}
