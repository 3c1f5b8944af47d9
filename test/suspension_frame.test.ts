import { CR, IsThrowCompletion, ThrowCompletion } from '../src/internal/completion_record';
import { BodyCoroutine, SuspendBody, SuspensionFrame } from '../src/internal/suspension_frame';
import { Val } from '../src/internal/val';

function* echoBody(frame: SuspensionFrame): BodyCoroutine {
  frame.Slots[0] = 'started';
  const first: CR<Val> = yield* SuspendBody(frame, {type: 'yield', yield: 1});
  frame.Slots[1] = IsThrowCompletion(first) ? `caught ${String(first.Value)}` : first;
  yield;
  const second = yield* SuspendBody(frame, {type: 'await', await: 'p'});
  return second;
}

describe('SuspensionFrame', () => {
  it('does not start the body on capture', () => {
    const frame = SuspensionFrame.capture([undefined, undefined], echoBody);
    expect(frame.Started).toBe(false);
    expect(frame.Released).toBe(false);
    expect(frame.Slots).toEqual([undefined, undefined]);
  });

  it('discards the value written before the first resumption', () => {
    const frame = SuspensionFrame.capture([undefined, undefined], echoBody);
    frame.writeResumptionValue('ignored');
    expect(frame.resume()).toEqual({done: false, value: {type: 'yield', yield: 1}});
    expect(frame.Started).toBe(true);
    expect(frame.Slots[0]).toBe('started');
    // Nothing is pending any more, so a new value may be written.
    frame.writeResumptionValue(42);
    expect(frame.resume()).toEqual({done: false, value: undefined});
    expect(frame.Slots[1]).toBe(42);
  });

  it('delivers throw completions to the suspension point', () => {
    const frame = SuspensionFrame.capture([undefined, undefined], echoBody);
    frame.writeResumptionValue(undefined);
    frame.resume();
    frame.writeResumptionValue(ThrowCompletion('boom'));
    frame.resume();
    expect(frame.Slots[1]).toBe('caught boom');
  });

  it('runs the body to termination', () => {
    const frame = SuspensionFrame.capture([undefined, undefined], echoBody);
    frame.writeResumptionValue(undefined);
    frame.resume();
    frame.writeResumptionValue('a');
    frame.resume();
    expect(frame.resume()).toEqual({done: false, value: {type: 'await', await: 'p'}});
    frame.writeResumptionValue('settled');
    expect(frame.resume()).toEqual({done: true, value: 'settled'});
  });

  it('rejects a second pending resumption value', () => {
    const frame = SuspensionFrame.capture([], echoBody);
    frame.writeResumptionValue(1);
    expect(() => frame.writeResumptionValue(2))
      .toThrow('Assertion failed: resumption value already pending');
  });

  it('rejects a resumption with no value written', () => {
    const frame = SuspensionFrame.capture([undefined, undefined], echoBody);
    frame.writeResumptionValue(undefined);
    frame.resume();
    expect(() => frame.resume()).toThrow('Assertion failed: resumed without a resumption value');
  });

  it('drops its continuation and locals on release', () => {
    const frame = SuspensionFrame.capture([1, 2, 3], echoBody);
    frame.release();
    expect(frame.Released).toBe(true);
    expect(frame.Slots).toEqual([]);
    expect(() => frame.resume()).toThrow('Assertion failed: resumed a released frame');
  });
});
