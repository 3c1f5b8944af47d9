import { AfterCompletion, AsyncGen, AsyncGeneratorState, ExecuteBody, GeneratorHost, IterResult } from '../src/internal/async_generator';
import { BreakCompletion, IsAbrupt, ReturnCompletion, ThrowCompletion } from '../src/internal/completion_record';
import { BodyCoroutine, GeneratorBody, SuspendBody, SuspensionFrame } from '../src/internal/suspension_frame';
import { Val } from '../src/internal/val';

let settleCounter = 0;

class Deferred {
  state: 'pending'|'fulfilled'|'rejected' = 'pending';
  result: IterResult|undefined = undefined;
  reason: Val = undefined;
  order = -1;
  onSettle: (() => void)|undefined = undefined;

  constructor(readonly id: number) {}

  fulfill(result: IterResult) {
    if (this.state !== 'pending') throw new Error(`deferred ${this.id} settled twice`);
    this.state = 'fulfilled';
    this.result = result;
    this.order = settleCounter++;
    this.onSettle?.();
  }

  reject(reason: Val) {
    if (this.state !== 'pending') throw new Error(`deferred ${this.id} settled twice`);
    this.state = 'rejected';
    this.reason = reason;
    this.order = settleCounter++;
    this.onSettle?.();
  }
}

interface PendingAwait {
  readonly value: Val;
  readonly onFulfilled: (value: Val) => void;
  readonly onRejected: (reason: Val) => void;
}

/** Records awaits instead of scheduling them; tests fire them by hand. */
class FakeHost implements GeneratorHost<Deferred> {
  readonly awaits: PendingAwait[] = [];
  readonly traces: string[] = [];
  readonly deferreds: Deferred[] = [];
  ticks = 0;
  tickLimit = Infinity;

  constructor(readonly afterCompletion: AfterCompletion = 'done') {}

  readonly promises = {
    createDeferred: () => {
      const d = new Deferred(this.deferreds.length);
      this.deferreds.push(d);
      return d;
    },
    fulfill: (d: Deferred, result: IterResult) => d.fulfill(result),
    reject: (d: Deferred, reason: Val) => d.reject(reason),
  };

  readonly scheduler = {
    awaitValue: (value: Val, onFulfilled: (v: Val) => void, onRejected: (r: Val) => void) => {
      this.awaits.push({value, onFulfilled, onRejected});
    },
  };

  tick() {
    if (++this.ticks > this.tickLimit) throw new Error(`Exceeded ${this.tickLimit} steps`);
  }

  trace(message: string) {
    this.traces.push(message);
  }

  settleAwait(outcome: 'fulfill'|'reject', value: Val) {
    const pending = this.awaits.shift();
    if (!pending) throw new Error('no outstanding await');
    if (outcome === 'fulfill') {
      pending.onFulfilled(value);
    } else {
      pending.onRejected(value);
    }
  }
}

function expectFulfilled(d: Deferred, value: Val, done: boolean) {
  expect(d.state).toBe('fulfilled');
  expect(d.result).toEqual({value, done});
}

function expectRejected(d: Deferred, reason: Val) {
  expect(d.state).toBe('rejected');
  expect(d.reason).toBe(reason);
}

/** Yields 1, then 2, then returns 'end'. */
function* counter(frame: SuspensionFrame): BodyCoroutine {
  const a = yield* SuspendBody(frame, {type: 'yield', yield: 1});
  if (IsAbrupt(a)) return a;
  const b = yield* SuspendBody(frame, {type: 'yield', yield: 2});
  if (IsAbrupt(b)) return b;
  return 'end';
}

/** Awaits 'x', yields what the await produced, then reports what it was resumed with. */
function* awaitThenYield(frame: SuspensionFrame): BodyCoroutine {
  const v = yield* SuspendBody(frame, {type: 'await', await: 'x'});
  if (IsAbrupt(v)) return v;
  const r = yield* SuspendBody(frame, {type: 'yield', yield: v});
  if (IsAbrupt(r)) return r;
  return `after ${String(r)}`;
}

describe('ExecuteBody', () => {
  const noTick = () => {};

  it('classifies a yield', () => {
    const frame = SuspensionFrame.capture([], counter);
    expect(ExecuteBody(frame, undefined, noTick)).toEqual({Type: 'yield', Value: 1});
  });

  it('classifies an await', () => {
    const frame = SuspensionFrame.capture([], awaitThenYield);
    expect(ExecuteBody(frame, undefined, noTick)).toEqual({Type: 'await', Value: 'x'});
  });

  it('classifies a return completion as a normal completion of its value', () => {
    const frame = SuspensionFrame.capture([], counter);
    ExecuteBody(frame, undefined, noTick);
    expect(ExecuteBody(frame, ReturnCompletion(9), noTick)).toEqual({Type: 'normal', Value: 9});
  });

  it('classifies an uncaught throw', () => {
    const frame = SuspensionFrame.capture([], counter);
    ExecuteBody(frame, undefined, noTick);
    expect(ExecuteBody(frame, ThrowCompletion('e'), noTick)).toEqual({Type: 'throw', Value: 'e'});
  });

  it('forwards step ticks without ending the run', () => {
    const body: GeneratorBody = function*() {
      yield;
      yield;
      return 3;
    };
    const frame = SuspensionFrame.capture([], body);
    let ticks = 0;
    expect(ExecuteBody(frame, undefined, () => ticks++)).toEqual({Type: 'normal', Value: 3});
    expect(ticks).toBe(2);
  });

  it('rejects a break completion escaping the body', () => {
    const body: GeneratorBody = function*() {
      return BreakCompletion();
    };
    const frame = SuspensionFrame.capture([], body);
    expect(() => ExecuteBody(frame, undefined, noTick))
      .toThrow('Assertion failed: break completion escaped the generator body');
  });
});

describe('AsyncGen', () => {
  it('runs the body on the first next()', () => {
    const host = new FakeHost();
    const g = new AsyncGen(host, [], counter, 'g');
    expect(g.State).toBe(AsyncGeneratorState.SuspendedStart);
    const d = g.next(undefined);
    expectFulfilled(d, 1, false);
    expect(g.State).toBe(AsyncGeneratorState.AwaitingYield);
    expect(g.QueueSize).toBe(0);
    expect(host.traces).toEqual([
      'g: suspendedStart -> executing',
      'g: executing -> suspendedYield',
    ]);
  });

  it('settles requests in the order they were made', () => {
    const host = new FakeHost();
    const g = new AsyncGen(host, [], counter);
    const ds = [g.next(undefined), g.next(undefined), g.next(undefined), g.next(undefined)];
    expectFulfilled(ds[0], 1, false);
    expectFulfilled(ds[1], 2, false);
    expectFulfilled(ds[2], 'end', true);
    expectFulfilled(ds[3], undefined, true);
    expect(ds.map(d => d.order)).toEqual([...ds.map(d => d.order)].sort((a, b) => a - b));
    expect(g.State).toBe(AsyncGeneratorState.Completed);
    expect(g.Frame.Released).toBe(true);
  });

  it('completes without entering the body on return() before the first next()', () => {
    const host = new FakeHost();
    let entered = false;
    const g = new AsyncGen(host, [], function*() {
      entered = true;
      return 'unreachable';
    }, 'g');
    expectFulfilled(g.return(5), 5, true);
    expect(entered).toBe(false);
    expect(g.State).toBe(AsyncGeneratorState.Completed);
    expect(host.traces).toEqual(['g: suspendedStart -> completed']);
  });

  it('rejects throw() before the first next() with the thrown value', () => {
    const host = new FakeHost();
    const g = new AsyncGen(host, [], counter);
    expectRejected(g.throw('early'), 'early');
    expect(g.State).toBe(AsyncGeneratorState.Completed);
    expect(g.Frame.Started).toBe(false);
  });

  it('delivers return() at a yield as a completion of the body', () => {
    const host = new FakeHost();
    const g = new AsyncGen(host, [], counter);
    g.next(undefined);
    expectFulfilled(g.return(7), 7, true);
    expect(g.State).toBe(AsyncGeneratorState.Completed);
  });

  it('rejects throw() at a yield the body does not catch', () => {
    const host = new FakeHost();
    const g = new AsyncGen(host, [], counter);
    g.next(undefined);
    expectRejected(g.throw('bad'), 'bad');
    expectFulfilled(g.next(undefined), undefined, true);
  });

  it('settles everything as done after completion by default', () => {
    const host = new FakeHost('done');
    const g = new AsyncGen(host, [], counter);
    g.return(0);
    expectFulfilled(g.next(1), undefined, true);
    expectFulfilled(g.return(2), undefined, true);
    expectFulfilled(g.throw('e'), undefined, true);
  });

  it('settles by request kind after completion when asked to', () => {
    const host = new FakeHost('per-kind');
    const g = new AsyncGen(host, [], counter);
    g.return(0);
    expectFulfilled(g.next(1), undefined, true);
    expectFulfilled(g.return(2), 2, true);
    expectRejected(g.throw('e'), 'e');
  });

  it('parks on an await and queues requests behind it', () => {
    const host = new FakeHost();
    const g = new AsyncGen(host, [], awaitThenYield);
    const d1 = g.next(undefined);
    const d2 = g.next('second');
    expect(d1.state).toBe('pending');
    expect(d2.state).toBe('pending');
    expect(g.State).toBe(AsyncGeneratorState.Executing);
    expect(g.QueueSize).toBe(2);
    expect(host.awaits.map(a => a.value)).toEqual(['x']);

    host.settleAwait('fulfill', 'X');
    expectFulfilled(d1, 'X', false);
    expectFulfilled(d2, 'after second', true);
    expect(g.QueueSize).toBe(0);
  });

  it('resumes a rejected await as a throw', () => {
    const host = new FakeHost();
    const g = new AsyncGen(host, [], awaitThenYield);
    const d1 = g.next(undefined);
    const d2 = g.next(undefined);
    host.settleAwait('reject', 'nope');
    expectRejected(d1, 'nope');
    expectFulfilled(d2, undefined, true);
    expect(g.State).toBe(AsyncGeneratorState.Completed);
  });

  it('refuses a second settlement of the same await', () => {
    const host = new FakeHost();
    const g = new AsyncGen(host, [], awaitThenYield);
    g.next(undefined);
    const [pending] = host.awaits;
    pending.onFulfilled('a');
    expect(() => pending.onFulfilled('b')).toThrow('Assertion failed: await continuation invoked twice');
  });

  it('queues a request made from inside a settlement behind earlier ones', () => {
    const host = new FakeHost();
    const g = new AsyncGen(host, [], awaitThenYield);
    const d1 = g.next(undefined);
    let inner: Deferred|undefined;
    d1.onSettle = () => {
      inner = g.next('from callback');
    };
    const d2 = g.next('queued');
    host.settleAwait('fulfill', 'X');

    expectFulfilled(d1, 'X', false);
    expectFulfilled(d2, 'after queued', true);
    expect(inner).toBeDefined();
    if (!inner) return;
    expectFulfilled(inner, undefined, true);
    expect(d1.order).toBeLessThan(d2.order);
    expect(d2.order).toBeLessThan(inner.order);
  });

  it('reports step ticks to the host', () => {
    const host = new FakeHost();
    const g = new AsyncGen(host, [], function*(frame) {
      yield;
      yield;
      yield;
      const r = yield* SuspendBody(frame, {type: 'yield', yield: 'a'});
      return r;
    });
    g.next(undefined);
    expect(host.ticks).toBe(3);
  });

  it('completes and settles its request when the host aborts the body', () => {
    const host = new FakeHost();
    host.tickLimit = 2;
    const g = new AsyncGen(host, [], function*() {
      while (true) yield;
    }, 'g');
    expect(() => g.next(undefined)).toThrow('Exceeded 2 steps');
    expectFulfilled(host.deferreds[0], undefined, true);
    expect(g.State).toBe(AsyncGeneratorState.Completed);
    expect(g.QueueSize).toBe(0);
    expect(g.Frame.Released).toBe(true);
    expect(host.traces).toEqual([
      'g: suspendedStart -> executing',
      'g: executing -> completed',
    ]);
    expectFulfilled(g.next(undefined), undefined, true);
  });

  it('settles requests queued behind an await when the resumed body is aborted', () => {
    const host = new FakeHost('per-kind');
    host.tickLimit = 5;
    const g = new AsyncGen(host, [], function*(frame) {
      const v = yield* SuspendBody(frame, {type: 'await', await: 'x'});
      if (IsAbrupt(v)) return v;
      while (true) yield;
    });
    const d1 = g.next(undefined);
    const d2 = g.return('r');
    const d3 = g.throw('t');
    expect(() => host.settleAwait('fulfill', 1)).toThrow('Exceeded 5 steps');
    expectFulfilled(d1, undefined, true);
    expectFulfilled(d2, 'r', true);
    expectRejected(d3, 't');
    expect(g.State).toBe(AsyncGeneratorState.Completed);
    expect(d1.order).toBeLessThan(d2.order);
    expect(d2.order).toBeLessThan(d3.order);
  });

  it('settles every request exactly once under arbitrary interleavings', () => {
    function* pinger(frame: SuspensionFrame): BodyCoroutine {
      for (let i = 0; i < 5; i++) {
        const a = yield* SuspendBody(frame, {type: 'await', await: i});
        if (IsAbrupt(a)) return a;
        const r = yield* SuspendBody(frame, {type: 'yield', yield: a});
        if (IsAbrupt(r)) return r;
      }
      return 'finished';
    }

    for (const seed of [1, 7, 42, 1234, 99991]) {
      let state = seed;
      const rand = () => {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        return state / 2 ** 32;
      };
      const host = new FakeHost(rand() < 0.5 ? 'done' : 'per-kind');
      const g = new AsyncGen(host, [], pinger);
      for (let op = 0; op < 60; op++) {
        const r = rand();
        if (host.awaits.length && r < 0.4) {
          host.settleAwait(rand() < 0.8 ? 'fulfill' : 'reject', op);
        } else if (r < 0.8) {
          g.next(op);
        } else if (r < 0.9) {
          g.return(op);
        } else {
          g.throw(op);
        }
      }
      while (host.awaits.length) host.settleAwait('fulfill', 'flush');

      expect(host.deferreds.filter(d => d.state === 'pending')).toEqual([]);
      const orders = host.deferreds.map(d => d.order);
      expect(orders).toEqual([...orders].sort((a, b) => a - b));
      expect(g.QueueSize).toBe(0);
    }
  });
});
