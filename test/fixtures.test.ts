import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse } from 'yaml';
import { AfterCompletion, AsyncGeneratorInstance, DriveGenerator, FormatSettlement, IsAbrupt, newVM } from '../src/index';

/**
 * Each fixture is a script with a front matter block:
 *
 *   /*---
 *   description: what the script exercises
 *   afterCompletion: per-kind   # optional
 *   expect:
 *     - '{value: 1, done: false}'
 *   ---*\/
 *
 * The script's `main` generator is driven with next() until it is
 * done, and each settlement must match the next line of `expect`.
 */
interface Metadata {
  readonly description: string;
  readonly expect: string[];
  readonly afterCompletion?: AfterCompletion;
}

const FIXTURES = path.join(__dirname, 'fixtures');

function isMetadata(v: unknown): v is Metadata {
  if (typeof v !== 'object' || v === null) return false;
  if (!('description' in v) || typeof v.description !== 'string') return false;
  if (!('expect' in v) || !Array.isArray(v.expect)) return false;
  if (!v.expect.every((line: unknown) => typeof line === 'string')) return false;
  if ('afterCompletion' in v &&
      v.afterCompletion !== 'done' && v.afterCompletion !== 'per-kind') return false;
  return true;
}

function readFixture(file: string): {source: string, metadata: Metadata} {
  const source = fs.readFileSync(path.join(FIXTURES, file), 'utf8');
  const match = /\/\*---(.*?)---\*\//s.exec(source);
  if (!match) throw new Error(`${file}: missing front matter`);
  const metadata: unknown = parse(match[1].replace(/\r\n?/g, '\n'));
  if (!isMetadata(metadata)) throw new Error(`${file}: malformed front matter`);
  return {source, metadata};
}

const files = fs.readdirSync(FIXTURES).filter((f) => f.endsWith('.js')).sort();

describe('fixtures', () => {
  it('finds fixtures to run', () => {
    expect(files.length).toBeGreaterThan(0);
  });

  it.each(files)('%s', (file) => {
    const {source, metadata} = readFixture(file);
    const vm = newVM({afterCompletion: metadata.afterCompletion});
    const realm = vm.createRealm();
    const cr = vm.evaluateScript(source, realm, {filename: file});
    expect(IsAbrupt(cr)).toBe(false);
    vm.runJobs();
    const generator = vm.callFunction(vm.getGlobal(realm, 'main'));
    if (!(generator instanceof AsyncGeneratorInstance)) {
      throw new Error(`${file}: main is not an async generator function`);
    }
    const results: string[] = [];
    DriveGenerator(vm, generator, (s) => results.push(FormatSettlement(s)),
                   {maxRequests: metadata.expect.length});
    expect(results).toEqual(metadata.expect);
  });
});
