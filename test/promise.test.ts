import { newVM } from '../src/index';
import { ErrorObject } from '../src/internal/error_object';
import { JobQueue } from '../src/internal/job';
import { NewPromiseCapability, PerformPromiseThen, PromiseResolve } from '../src/internal/promise';
import { Val } from '../src/internal/val';

describe('JobQueue', () => {
  it('runs microtasks before timers, and timers by due time then insertion', () => {
    const queue = new JobQueue();
    const log: string[] = [];
    queue.enqueueTimer(10, () => log.push(`t10@${queue.Now}`));
    queue.enqueueTimer(5, () => {
      log.push(`t5a@${queue.Now}`);
      queue.enqueueMicrotask(() => log.push('m2'));
    });
    queue.enqueueTimer(5, () => log.push(`t5b@${queue.Now}`));
    queue.enqueueMicrotask(() => log.push('m1'));
    while (queue.runNext());
    expect(log).toEqual(['m1', 't5a@5', 'm2', 't5b@5', 't10@10']);
    expect(queue.Now).toBe(10);
    expect(queue.hasPendingTask()).toBe(false);
  });

  it('measures delays from the current virtual time', () => {
    const queue = new JobQueue();
    const log: string[] = [];
    queue.enqueueTimer(3, () => {
      queue.enqueueTimer(4, () => log.push(`inner@${queue.Now}`));
    });
    queue.enqueueTimer(5, () => log.push(`outer@${queue.Now}`));
    while (queue.runNext());
    expect(log).toEqual(['outer@5', 'inner@7']);
  });

  it('treats negative and non-finite delays as zero', () => {
    const queue = new JobQueue();
    const log: string[] = [];
    queue.enqueueTimer(1, () => log.push('one'));
    queue.enqueueTimer(-5, () => log.push('negative'));
    queue.enqueueTimer(NaN, () => log.push('nan'));
    while (queue.runNext());
    expect(log).toEqual(['negative', 'nan', 'one']);
  });

  it('never fires a timer with an infinite delay', () => {
    const queue = new JobQueue();
    const log: string[] = [];
    queue.enqueueTimer(Infinity, () => log.push('forever'));
    queue.enqueueTimer(-Infinity, () => log.push('now'));
    while (queue.runNext());
    expect(log).toEqual(['now']);
    expect(queue.Now).toBe(0);
    expect(queue.hasPendingTask()).toBe(false);
  });

    it('reports nothing to run when empty', () => {
    const queue = new JobQueue();
    expect(queue.runNext()).toBe(false);
    expect(queue.hasPendingMicrotask()).toBe(false);
  });
});

describe('promises', () => {
  function setup() {
    const vm = newVM();
    const realm = vm.createRealm();
    return {vm, realm};
  }

  it('settles synchronously but reacts only through jobs', () => {
    const {vm, realm} = setup();
    const capability = NewPromiseCapability(vm, realm);
    const seen: Val[] = [];
    PerformPromiseThen(vm, capability.Promise, (v) => seen.push(v), () => {});
    capability.Resolve(42);
    expect(capability.Promise.PromiseState).toBe('fulfilled');
    expect(capability.Promise.PromiseResult).toBe(42);
    expect(seen).toEqual([]);
    vm.runJobs();
    expect(seen).toEqual([42]);
  });

  it('ignores a second resolution', () => {
    const {vm, realm} = setup();
    const capability = NewPromiseCapability(vm, realm);
    capability.Resolve(1);
    capability.Reject(2);
    capability.Resolve(3);
    expect(capability.Promise.PromiseState).toBe('fulfilled');
    expect(capability.Promise.PromiseResult).toBe(1);
  });

  it('takes extra jobs to adopt another promise', () => {
    const {vm, realm} = setup();
    const log: string[] = [];
    const inner = NewPromiseCapability(vm, realm);
    inner.Resolve('a');
    const adopting = NewPromiseCapability(vm, realm);
    adopting.Resolve(inner.Promise);
    const direct = NewPromiseCapability(vm, realm);
    PerformPromiseThen(vm, adopting.Promise, (v) => log.push(`adopting ${String(v)}`), () => {});
    PerformPromiseThen(vm, direct.Promise, (v) => log.push(`direct ${String(v)}`), () => {});
    direct.Resolve('b');
    expect(adopting.Promise.PromiseState).toBe('pending');
    vm.runJobs();
    expect(log).toEqual(['direct b', 'adopting a']);
  });

  it('rejects a promise resolved with itself', () => {
    const {vm, realm} = setup();
    const capability = NewPromiseCapability(vm, realm);
    capability.Resolve(capability.Promise);
    const {PromiseState, PromiseResult} = capability.Promise;
    expect(PromiseState).toBe('rejected');
    expect(PromiseResult).toBeInstanceOf(ErrorObject);
    if (!(PromiseResult instanceof ErrorObject)) return;
    expect(PromiseResult.Get('name')).toBe('TypeError');
    expect(PromiseResult.Get('message')).toBe('Chaining cycle detected for promise');
  });

  it('tracks rejections until a reaction is registered', () => {
    const {vm, realm} = setup();
    const capability = NewPromiseCapability(vm, realm);
    capability.Reject('oops');
    expect(vm.unhandledRejections.has(capability.Promise)).toBe(true);
    const reasons: Val[] = [];
    PerformPromiseThen(vm, capability.Promise, () => {}, (r) => reasons.push(r));
    expect(vm.unhandledRejections.has(capability.Promise)).toBe(false);
    vm.runJobs();
    expect(reasons).toEqual(['oops']);
  });

  it('does not track a rejection that already has a reaction', () => {
    const {vm, realm} = setup();
    const capability = NewPromiseCapability(vm, realm);
    PerformPromiseThen(vm, capability.Promise, () => {}, () => {});
    capability.Reject('handled');
    expect(vm.unhandledRejections.size).toBe(0);
  });

  it('passes promises through PromiseResolve unchanged', () => {
    const {vm, realm} = setup();
    const capability = NewPromiseCapability(vm, realm);
    expect(PromiseResolve(vm, capability.Promise, realm)).toBe(capability.Promise);
    const wrapped = PromiseResolve(vm, 'plain', realm);
    expect(wrapped.PromiseState).toBe('fulfilled');
    expect(wrapped.PromiseResult).toBe('plain');
  });
});
