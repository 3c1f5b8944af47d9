import * as acorn from 'acorn';
import { ToPrimitive } from './abstract_conversion';
import { Assert } from './assert';
import type { AfterCompletion, GeneratorHost } from './async_generator';
import { CR, IsAbrupt, ThrowCompletion } from './completion_record';
import { EMPTY, NOT_APPLICABLE, UNINITIALIZED } from './enums';
import { ErrorName, ErrorObject, MakeError } from './error_object';
import { ExecutionContext } from './execution_context';
import { Call, Func } from './func';
import { JobQueue } from './job';
import { CreateIterResultObject, Obj } from './obj';
import { NewPromiseCapability, PerformPromiseThen, Prom, PromiseCapability, PromiseResolve } from './promise';
import { BindingReference, GetValue, IsReference, ReferenceRecord } from './reference_record';
import { InitializeHostDefinedRealm, RealmAdvice, RealmRecord } from './realm_record';
import { analyze } from './static/errors';
import { AnalyzeScript, GetLayout } from './static/scope';
import type { SlotValue } from './suspension_frame';
import { IsNodeType, IsProgram, Node, NodeMap, NodeType, SourcePosition } from './tree';
import { Val } from './val';

/** Suspends a generator body, handing a value out to its requester. */
export type YieldSignal = {readonly type: 'yield', readonly yield: Val};
/** Suspends a generator body until the awaited value settles. */
export type AwaitSignal = {readonly type: 'await', readonly await: Val};
/** A bare `undefined` is a step tick: the evaluation merely paused. */
export type EvalSignal = YieldSignal|AwaitSignal|undefined;
export type EvalGen<T> = Generator<EvalSignal, T, undefined>;
export type ECR<T> = EvalGen<CR<T>>;

export type EvaluationResult = Val|ReferenceRecord|EMPTY;

interface SyntaxOp {
  Evaluation(): ECR<EvaluationResult>;
  InstantiateFunctionObject(realm: RealmRecord): Func;
}

export interface Plugin {
  id?: string;
  deps?: () => Plugin[];
  syntax?: SyntaxOpMap;
  realm?: RealmAdvice;
}

/** Anything that turns source text into an ESTree Program. */
export interface Parser {
  parseScript(source: string, filename: string): unknown;
}

export const acornParser: Parser = {
  parseScript(source, filename) {
    return acorn.parse(source, {
      ecmaVersion: 'latest',
      sourceType: 'script',
      locations: true,
      sourceFile: filename,
    });
  },
};

export interface VMOptions {
  parser?: Parser;
  /** Log generator state transitions through `log`. */
  trace?: boolean;
  /** How requests are settled once a generator has completed. */
  afterCompletion?: AfterCompletion;
  /** Evaluation steps and jobs allowed per top-level run. */
  maxSteps?: number;
}

interface EvaluateOptions {
  filename?: string;
}

export class VM {
  private executionStack: ExecutionContext[] = [];

  // Plugins - note: globals and intrinsics built in RealmRecord
  readonly plugins = new Map<string|Plugin, Plugin>();
  private readonly syntaxOperations: SyntaxHandlers = {
    Evaluation: new Map(),
    InstantiateFunctionObject: new Map(),
  };

  readonly jobs = new JobQueue();
  readonly unhandledRejections = new Set<Prom>();
  private readonly hosts = new WeakMap<RealmRecord, GeneratorHost<PromiseCapability>>();
  private defaultRealm: RealmRecord|undefined = undefined;
  private steps = 0;

  private readonly parser: Parser;
  private readonly maxSteps: number;

  constructor(readonly options: VMOptions = {}) {
    this.parser = options.parser ?? acornParser;
    this.maxSteps = options.maxSteps ?? Infinity;
  }

  createRealm(): RealmRecord {
    const realm = new RealmRecord();
    InitializeHostDefinedRealm(this, realm);
    this.defaultRealm ??= realm;
    return realm;
  }

  isRunning(): boolean {
    return this.executionStack.length > 0;
  }

  enterContext(context: ExecutionContext): void {
    this.executionStack.push(context);
  }

  popContext(context?: ExecutionContext): void {
    const top = this.executionStack.pop();
    Assert(top, 'Cannot pop an empty stack');
    if (context) Assert(top === context, 'Wrong context to pop');
  }

  getRunningContext(): ExecutionContext {
    const context = this.executionStack.at(-1);
    Assert(context, 'Not running');
    return context;
  }

  /**
   * The current Realm Record.  Host calls made between evaluations
   * (next() on a generator, job callbacks) fall back to the realm of
   * the most recent evaluation.
   */
  getRealm(): RealmRecord {
    const realm = this.executionStack.at(-1)?.Realm ?? this.defaultRealm;
    Assert(realm, 'No realm');
    return realm;
  }

  getIntrinsic(name: string): Obj {
    return this.getRealm().getIntrinsic(name);
  }

  makeError(name: ErrorName, message: string, realm = this.getRealm()): ErrorObject {
    return MakeError(this, realm, name, message);
  }

  throw(name: ErrorName, message: string): CR<never> {
    return ThrowCompletion(this.makeError(name, message));
  }

  captureStackTrace(O: ErrorObject): void {
    const frames: string[] = [];
    for (let i = this.executionStack.length - 1; i >= 0; i--) {
      const frame = this.executionStack[i];
      const node = frame.currentNode;
      if (!node) continue;
      const func = frame.Function?.InitialName || '<anonymous>';
      const position = SourcePosition(node);
      frames.push(`\n    at ${func}${position ? ` (${position})` : ''}`);
    }
    const name = String(ToPrimitive(O.Get('name')));
    const msg = String(ToPrimitive(O.Get('message')));
    const stack = `${msg ? `${name}: ${msg}` : name}${frames.join('')}`;
    O.OwnProps.set('stack', stack);
    O.ErrorData = stack;
  }

  /** Counts one step against the budget of the current run. */
  tick(): void {
    if (++this.steps > this.maxSteps) {
      throw new Error(`Exceeded ${this.maxSteps} steps`);
    }
  }

  /**
   * The promise provider and await scheduler that generators created
   * in the given realm use: VM promises, with resumptions delivered
   * as promise jobs.
   */
  generatorHost(realm: RealmRecord): GeneratorHost<PromiseCapability> {
    let host = this.hosts.get(realm);
    if (host) return host;
    host = {
      promises: {
        createDeferred: () => NewPromiseCapability(this, realm),
        fulfill: (deferred, {value, done}) => {
          deferred.Resolve(CreateIterResultObject(realm.getIntrinsic('%Object.prototype%'), value, done));
        },
        reject: (deferred, reason) => deferred.Reject(reason),
      },
      scheduler: {
        awaitValue: (value, onFulfilled, onRejected) => {
          PerformPromiseThen(this, PromiseResolve(this, value, realm), onFulfilled, onRejected);
        },
      },
      afterCompletion: this.options.afterCompletion ?? 'done',
      tick: () => this.tick(),
      trace: this.options.trace ? (message) => this.log(message) : undefined,
    };
    this.hosts.set(realm, host);
    return host;
  }

  /**
   * Parses, analyzes and evaluates a script in the given realm, and
   * returns its completion value.  Jobs the script enqueues are left
   * for `runJobs`.
   */
  evaluateScript(
    source: string,
    realm: RealmRecord,
    {filename = '<anonymous>'}: EvaluateOptions = {},
  ): CR<Val> {
    Assert(!this.isRunning(), 'Already running');
    this.defaultRealm = realm;
    this.steps = 0;
    let tree: unknown;
    try {
      tree = this.parser.parseScript(source, filename);
    } catch (err) {
      return this.throw('SyntaxError', err instanceof Error ? err.message : String(err));
    }
    Assert(IsProgram(tree), 'Parser did not produce a Program');
    const errors = AnalyzeScript(tree);
    errors.push(...analyze(tree, (type) => this.syntaxOperations.Evaluation.has(type)));
    if (errors.length) return this.throw('SyntaxError', errors[0]);

    const layout = GetLayout(tree);
    const slots = layout.Slots.map((): SlotValue => UNINITIALIZED);
    const context = new ExecutionContext(realm, layout, slots, null, null);
    this.enterContext(context);
    try {
      const result = this.drive(this.evaluateValue(tree));
      this.popContext(context);
      return result;
    } finally {
      this.unwind(0);
    }
  }

  /** Calls a function from outside any evaluation. */
  callFunction(fn: Val, args: Val[] = [], thisArg: Val = undefined): CR<Val> {
    return this.hostCall(() => this.drive(Call(this, fn, thisArg, args)));
  }

  /**
   * Runs a host request, such as next() on a generator, from outside
   * any evaluation and against a fresh step budget.
   */
  hostCall<T>(request: () => T): T {
    Assert(!this.isRunning(), 'Already running');
    this.steps = 0;
    try {
      return request();
    } finally {
      this.unwind(0);
    }
  }

  getGlobal(realm: RealmRecord, name: string): Val {
    const value = realm.GlobalBindings.get(name)?.Value;
    return UNINITIALIZED.is(value) ? undefined : value;
  }

  /**
   * Runs queued jobs until both queues are empty, including timers
   * still pending on the virtual clock.  Each job counts as a step.
   */
  runJobs(): void {
    Assert(!this.isRunning(), 'Already running');
    this.steps = 0;
    try {
      while (this.jobs.runNext()) this.tick();
    } finally {
      this.unwind(0);
    }
  }

  /**
   * Drops contexts left behind when a host error (an exceeded step
   * budget or a failed assertion) escapes mid-evaluation.
   */
  private unwind(depth: number): void {
    this.executionStack.length = Math.min(this.executionStack.length, depth);
  }

  /**
   * Runs synchronous evaluation to completion.  Only generator
   * bodies may suspend, and those are driven by their own executor.
   */
  private drive<T>(gen: EvalGen<T>): T {
    while (true) {
      const step = gen.next();
      if (step.done) return step.value;
      Assert(!step.value, 'Suspension outside of an async generator body');
      this.tick();
    }
  }

  // NOTE: this helper method is typically more useful than direct
  // Evaluation because it additionally unwraps ReferenceRecords.
  // ECMA-262 does this in a production that's basically transparent
  // to ESTree, so we don't have a good opportunity, but we do know
  // when an rvalue is required from a child.
  * evaluateValue(node: Node): ECR<Val> {
    const result = yield* this.Evaluation(node);
    if (IsAbrupt(result)) return result;
    if (EMPTY.is(result)) return undefined;
    if (IsReference(result)) return GetValue(this, result);
    return result;
  }

  log(msg: string): void {
    console.log(msg);
  }

  * Evaluation(n: Node): ECR<EvaluationResult> {
    this.getRunningContext().currentNode = n;
    return yield* this.operate('Evaluation', n, [], () => {
      throw new Error(`Cannot evaluate ${n.type}`);
    });
  }

  InstantiateFunctionObject(n: Node, realm: RealmRecord): Func {
    return this.operate('InstantiateFunctionObject', n, [realm], () => {
      throw new Error(`Cannot instantiate ${n.type}`);
    });
  }

  private operate<O extends keyof SyntaxOp>(
    op: O,
    n: Node,
    args: SyntaxArgs<O>,
    fallback: () => SyntaxResult<O>,
  ): SyntaxResult<O> {
    const handlers: HandlerTable<O> = this.syntaxOperations[op];
    for (const impl of handlers.get(n.type) ?? []) {
      const result = impl(n, args);
      if (!NOT_APPLICABLE.is(result)) return result;
    }
    return fallback();
  }

  install(plugin: Plugin): void {
    for (const dep of plugin.deps?.() ?? []) {
      const id = dep.id ?? dep;
      if (!this.plugins.has(id)) this.install(dep);
    }
    const id = plugin.id ?? plugin;
    this.plugins.set(id, plugin);

    plugin.syntax?.Evaluation?.(this.registration('Evaluation'));
    plugin.syntax?.InstantiateFunctionObject?.(this.registration('InstantiateFunctionObject'));
  }

  private registration<O extends keyof SyntaxOp>(op: O): SyntaxRegistration<O> {
    const table: HandlerTable<O> = this.syntaxOperations[op];
    return (types, handler) => {
      for (const type of toArray(types)) {
        const list = table.get(type) ?? [];
        list.push((n, args) => IsNodeType(n, type) ? handler(this, n, ...args) : NOT_APPLICABLE);
        table.set(type, list);
      }
    };
  }
}

function toArray<T extends string>(v: T|T[]): T[] {
  return typeof v === 'string' ? [v] : v;
}

export function* just<T>(value: T): Generator<EvalSignal, T, undefined> {
  return value;
}

export function when<N, A extends unknown[], T>(
  condition: (n: N) => boolean|undefined,
  action: ($: VM, n: N, ...rest: A) => T,
): ($: VM, n: N, ...rest: A) => T|NOT_APPLICABLE {
  return ($, n, ...rest) => condition(n) ? action($, n, ...rest) : NOT_APPLICABLE;
}

const IDENTIFIER = /^[_$a-z][_$a-z0-9]*$/i;

export function DebugString(
  v: Val|ReferenceRecord,
  depth = 0,
  circular = new Set<Obj>(),
  indent = '',
): string {
  if (IsReference(v)) {
    if (v instanceof BindingReference) return v.ReferencedName;
    return `${DebugString(v.Base)}.${v.ReferencedName}`;
  }
  if (typeof v === 'string') return JSON.stringify(v);
  if (typeof v === 'bigint') return `${String(v)}n`;
  if (typeof v === 'number' && Object.is(v, -0)) return '-0';
  if (!(v instanceof Obj)) return String(v);

  if (v.InternalName.startsWith('%')) return v.InternalName;
  if (v instanceof ErrorObject) return v.ErrorData || 'Error';
  if (v instanceof Func) return `[Function: ${v.InitialName || '(anonymous)'}]`;
  if (v instanceof Prom) {
    if (v.PromiseState === 'pending') return 'Promise {<pending>}';
    const result = DebugString(v.PromiseResult, depth, circular, indent);
    return v.PromiseState === 'fulfilled' ?
      `Promise {${result}}` : `Promise {<rejected> ${result}}`;
  }
  if (v.InternalName && !v.OwnProps.size) return `[${v.InternalName}]`;
  if (depth <= 0) return '{...}';
  if (circular.has(v)) return '%circular%';
  circular.add(v);
  const elems = [];
  let complex = false;
  for (const [k, value] of v.OwnProps) {
    const key = IDENTIFIER.test(k) ? k : JSON.stringify(k);
    if (value instanceof Obj) complex = true;
    elems.push(`${key}: ${DebugString(value, depth - 1, circular, `${indent}  `)}`);
  }
  circular.delete(v);
  if (!complex && elems.length < 10) return `{${elems.join(', ')}}`;
  return `{\n${indent}  ${elems.join(`,\n${indent}  `)}\n${indent}}`;
}

type SyntaxArgs<O extends keyof SyntaxOp> = Parameters<SyntaxOp[O]>;
type SyntaxResult<O extends keyof SyntaxOp> = ReturnType<SyntaxOp[O]>;

type SyntaxOpMap = {[O in keyof SyntaxOp]?: (on: SyntaxRegistration<O>) => void};
type SyntaxRegistration<O extends keyof SyntaxOp> =
  <N extends NodeType>(types: N|N[], handler: SyntaxHandler<N, O>) => void;
type SyntaxHandler<N extends NodeType, O extends keyof SyntaxOp> =
  ($: VM, n: NodeMap[N], ...rest: SyntaxArgs<O>) => SyntaxResult<O>|NOT_APPLICABLE;

type StoredHandler<O extends keyof SyntaxOp> =
  (n: Node, args: SyntaxArgs<O>) => SyntaxResult<O>|NOT_APPLICABLE;
type HandlerTable<O extends keyof SyntaxOp> = Map<NodeType, Array<StoredHandler<O>>>;
type SyntaxHandlers = {[O in keyof SyntaxOp]: HandlerTable<O>};
