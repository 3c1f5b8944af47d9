import { VM, VMOptions } from './internal/vm';
import { full } from './plugins';

export { DebugString, VM } from './internal/vm';
export type { Parser, Plugin, VMOptions } from './internal/vm';
export { AsyncGen, AsyncGeneratorState } from './internal/async_generator';
export type { AfterCompletion, AwaitScheduler, GeneratorHost, IterResult, PromiseProvider } from './internal/async_generator';
export { AsyncGeneratorInstance } from './internal/async_generator_function';
export { IsAbrupt, IsThrowCompletion } from './internal/completion_record';
export { DriveGenerator, FormatSettlement, SettlementOf } from './driver';
export type { Settlement } from './driver';
export * from './plugins';

/** A VM with every plugin installed. */
export function newVM(options?: VMOptions): VM {
  const vm = new VM(options);
  vm.install(full);
  return vm;
}
