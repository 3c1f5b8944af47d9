import { main } from '../src/main';

interface Run {
  readonly code: number|undefined;
  readonly out: unknown[];
  readonly err: unknown[];
}

/** Runs the CLI with console output captured. */
function run(...args: string[]): Run {
  const log = jest.spyOn(console, 'log').mockImplementation(() => {});
  const error = jest.spyOn(console, 'error').mockImplementation(() => {});
  let code: number|undefined;
  try {
    main(args, (c) => {
      code = c;
    });
    return {
      code,
      out: log.mock.calls.map((call) => call[0]),
      err: error.mock.calls.map((call) => call[0]),
    };
  } finally {
    log.mockRestore();
    error.mockRestore();
  }
}

describe('ratchet', () => {
  it('drives main until it is done', () => {
    expect(run('-e', 'async function* main() { yield 1; }')).toEqual({
      code: 0,
      out: ['{value: 1, done: false}', '{value: undefined, done: true}'],
      err: [],
    });
  });

  it('drives the generator named by --entry', () => {
    const {code, out} = run('--entry', 'gen', '-e', 'async function* gen() { return 2; }');
    expect(code).toBe(0);
    expect(out).toEqual(['{value: 2, done: true}']);
  });

  const throwAfterDone = `
    async function* inner() {}
    async function* main() {
      const g = inner();
      await g.next();
      try {
        await g.throw('x');
      } catch (e) {
        yield 'caught ' + e;
      }
    }`;

  it('settles requests after completion as done by default', () => {
    expect(run('-e', throwAfterDone).out).toEqual(['{value: undefined, done: true}']);
  });

  it('settles requests after completion by kind with --per-kind', () => {
    expect(run('--per-kind', '-e', throwAfterDone).out).toEqual([
      '{value: "caught x", done: false}',
      '{value: undefined, done: true}',
    ]);
  });

  it('logs state transitions with --trace', () => {
    expect(run('--trace', '-e', 'async function* main() {}').out).toEqual([
      'main: suspendedStart -> executing',
      'main: executing -> completed',
      '{value: undefined, done: true}',
    ]);
  });

  it.each(['0', '-3', '1.5', 'lots'])('rejects --max-steps %s', (value) => {
    expect(run('--max-steps', value, '-e', '1')).toEqual({
      code: 2,
      out: [],
      err: ['--max-steps takes a positive integer'],
    });
  });

  it('fails a run that exceeds --max-steps', () => {
    expect(run('--max-steps', '50', '-e', 'async function* main() { while (true) {} }')).toEqual({
      code: 1,
      out: [],
      err: ['Exceeded 50 steps'],
    });
  });

  it('reports an uncaught script error', () => {
    expect(run('-e', "throw 'plain'")).toEqual({code: 1, out: [], err: ['Uncaught "plain"']});
  });

  it('refuses an entry that is not an async generator function', () => {
    expect(run('-e', 'var main = resolve;')).toEqual({
      code: 1,
      out: [],
      err: ['main is not an async generator function'],
    });
  });

  it('prints usage for --help', () => {
    const {code, out} = run('--help');
    expect(code).toBe(0);
    expect(out).toHaveLength(1);
    expect(String(out[0])).toMatch(/^Usage:\n  ratchet \[options\] file\.js/);
  });
});
