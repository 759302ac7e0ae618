import {
  LoadPlan,
  LoaderState,
  LoaderStateMachine,
  StateTransition,
  canTransition,
  isTerminal,
} from './loader-state';

describe('loader state machine', () => {
  describe('canTransition', () => {
    it('allows the next state of the plan only', () => {
      expect(canTransition(LoadPlan.ONLINE, LoaderState.IDLE, LoaderState.CONFIRM_WIPE)).toBe(true);
      expect(canTransition(LoadPlan.ONLINE, LoaderState.IDLE, LoaderState.WIPE)).toBe(false);
      expect(canTransition(LoadPlan.OFFLINE, LoaderState.IDLE, LoaderState.LOAD)).toBe(true);
      expect(canTransition(LoadPlan.OFFLINE, LoaderState.IDLE, LoaderState.CONFIRM_WIPE)).toBe(
        false,
      );
    });

    it('allows FAILED from every non-terminal state', () => {
      for (const state of [LoaderState.IDLE, LoaderState.WIPE, LoaderState.VALIDATE]) {
        expect(canTransition(LoadPlan.ONLINE, state, LoaderState.FAILED)).toBe(true);
      }
    });

    it('leaves terminal states closed', () => {
      expect(isTerminal(LoaderState.DONE)).toBe(true);
      expect(isTerminal(LoaderState.FAILED)).toBe(true);
      expect(isTerminal(LoaderState.LOAD)).toBe(false);
      expect(canTransition(LoadPlan.ONLINE, LoaderState.DONE, LoaderState.FAILED)).toBe(false);
      expect(canTransition(LoadPlan.ONLINE, LoaderState.FAILED, LoaderState.IDLE)).toBe(false);
    });
  });

  describe('LoaderStateMachine', () => {
    it('walks a plan and records every transition', () => {
      const seen: StateTransition[] = [];
      const machine = new LoaderStateMachine(LoadPlan.SCHEMA, (t) => seen.push(t));

      expect(machine.remaining()).toEqual([LoaderState.SCHEMA_APPLY, LoaderState.DONE]);
      machine.advance(LoaderState.SCHEMA_APPLY);
      expect(machine.remaining()).toEqual([LoaderState.DONE]);
      machine.advance(LoaderState.DONE);

      expect(machine.state).toBe(LoaderState.DONE);
      expect(machine.remaining()).toEqual([]);
      expect(seen).toEqual(machine.transitions);
      expect(seen.map((t) => [t.from, t.to])).toEqual([
        [LoaderState.IDLE, LoaderState.SCHEMA_APPLY],
        [LoaderState.SCHEMA_APPLY, LoaderState.DONE],
      ]);
    });

    it('keeps the reason of a failure', () => {
      const machine = new LoaderStateMachine(LoadPlan.WIPE);

      machine.advance(LoaderState.CONFIRM_WIPE);
      machine.advance(LoaderState.FAILED, 'not confirmed');

      expect(machine.transitions[1]).toMatchObject({
        plan: LoadPlan.WIPE,
        from: LoaderState.CONFIRM_WIPE,
        to: LoaderState.FAILED,
        reason: 'not confirmed',
      });
      expect(machine.transitions[0]).not.toHaveProperty('reason');
    });

    it('rejects an illegal transition without changing state', () => {
      const machine = new LoaderStateMachine(LoadPlan.ONLINE);

      expect(() => machine.advance(LoaderState.LOAD)).toThrow(
        'Illegal transition IDLE -> LOAD in online plan',
      );
      expect(machine.state).toBe(LoaderState.IDLE);
      expect(machine.transitions).toEqual([]);
    });
  });
});
