// Assertions guard the interpreter's own invariants (queue/state
// consistency, single-shot callbacks).  A failure is a bug in the
// runtime, never a language-level error, so it is thrown as a host
// Error rather than returned as a completion.

export function Assert(arg: unknown, msg?: string): asserts arg {
  if (!arg) {
    throw new Error(`Assertion failed${msg ? `: ${msg}` : ''}`);
  }
}
