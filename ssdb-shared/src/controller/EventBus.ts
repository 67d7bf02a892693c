/**
 * Typed event bus with a single mailbox.
 *
 * Events are handled one at a time in arrival order. Handlers for the same
 * event type run in subscription order, each awaited before the next. An
 * event posted from inside a handler (through its context) is part of the
 * posting event's cascade: it runs right after that event's handlers, ahead
 * of anything already waiting, and the posting event's `dispatch` promise
 * settles only once it is done.
 */

export interface BusEvent {
  type: string;
}

export interface HandlerContext<E extends BusEvent> {
  /** Queue a follow-up event as part of the current cascade. */
  emit(event: E): void;
}

export type Handler<E extends BusEvent, T extends E['type']> =
  (event: Extract<E, { type: T }>, ctx: HandlerContext<E>) => void | Promise<void>;

export interface DispatchResult<E extends BusEvent> {
  event: E;
  /** Errors raised by this event's handlers and by every event it caused. */
  errors: unknown[];
}

type ErrorListener<E extends BusEvent> = (error: unknown, event: E) => void;

interface Job<E extends BusEvent> {
  event: E;
  parent: Job<E> | null;
  pending: number;
  errors: unknown[];
  resolve: (result: DispatchResult<E>) => void;
}

interface Subscription<E extends BusEvent> {
  type: E['type'];
  run: (event: E, ctx: HandlerContext<E>) => void | Promise<void>;
}

export class EventBus<E extends BusEvent> {
  private _subs: Subscription<E>[] = [];
  private _queue: Job<E>[] = [];
  private _draining = false;
  private _idleWaiters: Array<() => void> = [];
  private _errorListeners: ErrorListener<E>[] = [];

  on<T extends E['type']>(type: T, handler: Handler<E, T>): () => void {
    const sub: Subscription<E> = {
      type,
      run: (event, ctx) => {
        if (!isOfType(event, type)) return;
        return handler(event, ctx);
      },
    };
    this._subs.push(sub);
    return () => {
      this._subs = this._subs.filter(s => s !== sub);
    };
  }

  onError(listener: ErrorListener<E>): () => void {
    this._errorListeners.push(listener);
    return () => {
      this._errorListeners = this._errorListeners.filter(l => l !== listener);
    };
  }

  /** Queue an external event; settles when its whole cascade has run. */
  dispatch(event: E): Promise<DispatchResult<E>> {
    return new Promise(resolve => {
      this.enqueue({ event, parent: null, pending: 1, errors: [], resolve });
    });
  }

  /** Resolves once the mailbox is empty and no handler is running. */
  whenIdle(): Promise<void> {
    if (!this._draining && this._queue.length === 0) return Promise.resolve();
    return new Promise(resolve => this._idleWaiters.push(resolve));
  }

  get busy(): boolean {
    return this._draining;
  }

  private enqueue(job: Job<E>): void {
    this._queue.push(job);
    if (!this._draining) void this.drain();
  }

  private async drain(): Promise<void> {
    this._draining = true;
    let job: Job<E> | undefined;
    while ((job = this._queue.shift()) !== undefined) {
      await this.runJob(job);
    }
    this._draining = false;
    const waiters = this._idleWaiters;
    this._idleWaiters = [];
    for (const w of waiters) w();
  }

  private async runJob(job: Job<E>): Promise<void> {
    const followUps: Job<E>[] = [];
    let handling = true;
    const ctx: HandlerContext<E> = {
      emit: (event) => {
        // Once the handlers have returned the cascade is closed; a late emit is a new event
        if (!handling) {
          this.enqueue({ event, parent: null, pending: 1, errors: [], resolve: () => {} });
          return;
        }
        job.pending++;
        followUps.push({ event, parent: job, pending: 1, errors: [], resolve: () => {} });
      },
    };
    // Snapshot so subscriptions made mid-event apply from the next event on
    const subs = this._subs.filter(s => s.type === job.event.type);
    for (const sub of subs) {
      try {
        await sub.run(job.event, ctx);
      } catch (err) {
        job.errors.push(err);
        this.reportError(err, job.event);
        // A failed step stops the rest of this event's handlers
        break;
      }
    }
    handling = false;
    // Follow-ups finish the cascade before the next waiting event starts
    this._queue.unshift(...followUps);
    this.finish(job);
  }

  private finish(job: Job<E>): void {
    job.pending--;
    if (job.pending > 0) return;
    job.resolve({ event: job.event, errors: job.errors });
    if (job.parent) {
      job.parent.errors.push(...job.errors);
      this.finish(job.parent);
    }
  }

  private reportError(err: unknown, event: E): void {
    for (const listener of [...this._errorListeners]) {
      try {
        listener(err, event);
      } catch (listenerErr) {
        process.stderr.write(`Error in bus error listener: ${String(listenerErr)}\n`);
      }
    }
  }
}

function isOfType<E extends BusEvent, T extends E['type']>(event: E, type: T): event is Extract<E, { type: T }> {
  return event.type === type;
}
