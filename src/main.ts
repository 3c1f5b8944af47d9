#!/usr/bin/env node

import * as acorn from 'acorn';
import * as fs from 'node:fs';
import * as readline from 'readline';
import { DriveGenerator, FormatSettlement } from './driver';
import { newVM } from './index';
import { AsyncGeneratorInstance } from './internal/async_generator_function';
import { IsAbrupt, IsThrowCompletion } from './internal/completion_record';
import { RealmRecord } from './internal/realm_record';
import { Val } from './internal/val';
import { DebugString, VM, VMOptions } from './internal/vm';

const USAGE = `Usage:
  ratchet [options] file.js   run a script, then drive its entry generator
  ratchet [options] -e SOURCE run inline source
  ratchet [options]           start a REPL

Options:
  --entry NAME      async generator function to drive (default: main)
  --trace           log generator state transitions
  --per-kind        settle requests after completion by kind
  --max-steps N     abort a run after N evaluation steps`;

interface Session {
  readonly vm: VM;
  readonly realm: RealmRecord;
  readonly entry: string;
}

function reportUnhandled(vm: VM): void {
  for (const promise of vm.unhandledRejections) {
    console.error(`Unhandled rejection: ${DebugString(promise.PromiseResult)}`);
  }
  vm.unhandledRejections.clear();
}

/** Drives a generator with next() until done, printing each result. */
function drive(session: Session, generator: AsyncGeneratorInstance): number {
  let status = 0;
  DriveGenerator(session.vm, generator, (settlement) => {
    console.log(FormatSettlement(settlement));
    if (settlement.kind !== 'fulfilled') status = 1;
  });
  return status;
}

function runScript(session: Session, source: string, filename: string, printResult = false): number {
  const {vm, realm} = session;
  let status = 0;
  try {
    const cr = vm.evaluateScript(source, realm, {filename});
    vm.runJobs();
    if (IsAbrupt(cr)) {
      if (!IsThrowCompletion(cr)) throw new Error(`Unexpected ${cr.Type} completion`);
      console.error(`Uncaught ${DebugString(cr.Value)}`);
      return 1;
    }
    if (printResult) {
      if (cr instanceof AsyncGeneratorInstance) return drive(session, cr);
      console.log(DebugString(cr, 2));
      return 0;
    }
    const entry = vm.getGlobal(realm, session.entry);
    if (entry !== undefined) status = driveEntry(session, entry);
  } finally {
    reportUnhandled(vm);
  }
  return status;
}

function driveEntry(session: Session, entry: Val): number {
  const generator = session.vm.callFunction(entry);
  if (IsAbrupt(generator)) {
    console.error(`Uncaught ${DebugString(generator.Value)}`);
    return 1;
  }
  if (!(generator instanceof AsyncGeneratorInstance)) {
    console.error(`${session.entry} is not an async generator function`);
    return 1;
  }
  return drive(session, generator);
}

export function main(args: string[], exit: (code: number) => void): void {
  const options: VMOptions = {};
  let entry = 'main';
  const scripts: Array<{source: string, filename: string}> = [];
  while (args.length > 0) {
    const arg = args.shift();
    switch (arg) {
      case '--entry':
        entry = args.shift() ?? entry;
        break;
      case '--trace':
        options.trace = true;
        break;
      case '--per-kind':
        options.afterCompletion = 'per-kind';
        break;
      case '--max-steps': {
        const steps = Number(args.shift());
        if (!Number.isInteger(steps) || steps <= 0) {
          console.error('--max-steps takes a positive integer');
          exit(2);
          return;
        }
        options.maxSteps = steps;
        break;
      }
      case '-e':
        scripts.push({source: args.shift() ?? '', filename: '<eval>'});
        break;
      case '-h':
      case '--help':
        console.log(USAGE);
        exit(0);
        return;
      default:
        if (arg === undefined) break;
        scripts.push({source: fs.readFileSync(arg, 'utf8'), filename: arg});
    }
  }

  const vm = newVM(options);
  const session = {vm, realm: vm.createRealm(), entry};
  if (!scripts.length) {
    repl(session);
    return;
  }
  for (const {source, filename} of scripts) {
    let status: number;
    try {
      status = runScript(session, source, filename);
    } catch (err) {
      console.error(err instanceof Error ? err.message : String(err));
      status = 1;
    }
    if (status) {
      exit(status);
      return;
    }
  }
  exit(0);
}

function repl(session: Session): void {
  const rl = readline.createInterface({input: process.stdin, output: process.stdout});
  let replNum = 0;
  function loop(script: string) {
    if (!script || script === 'exit') {
      rl.close();
      return;
    }
    try {
      acorn.parse(script, {ecmaVersion: 'latest'});
    } catch (err) {
      // acorn reports where it gave up; at the very end means the
      // input is merely incomplete.
      if (err instanceof SyntaxError && 'raisedAt' in err && err.raisedAt === script.length) {
        rl.question('... ', (s) => loop(`${script}\n${s}`));
        return;
      }
    }
    try {
      runScript(session, script, `REPL${++replNum}`, true);
    } catch (err) {
      console.error(err instanceof Error ? err.message : String(err));
    }
    rl.question('> ', loop);
  }
  rl.question('> ', loop);
}

if (require.main === module) main(process.argv.slice(2), process.exit);
