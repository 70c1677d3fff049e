import { Subject } from 'rxjs';
import type { Observable } from 'rxjs';

/**
 * A single observable value. `changed$` emits the new value on every actual change,
 * assigning an equal value is silent.
 */
export class Property<T> {
  private readonly changes = new Subject<T>();
  readonly changed$: Observable<T> = this.changes.asObservable();

  constructor(private current: T) {}

  get value(): T {
    return this.current;
  }

  set value(next: T) {
    if (Object.is(next, this.current)) return;
    this.current = next;
    this.changes.next(next);
  }

  complete(): void {
    this.changes.complete();
  }
}
