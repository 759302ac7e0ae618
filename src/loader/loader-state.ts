export enum LoaderState {
  IDLE = 'IDLE',
  CONFIRM_WIPE = 'CONFIRM_WIPE',
  WIPE = 'WIPE',
  SCHEMA_APPLY = 'SCHEMA_APPLY',
  LOAD = 'LOAD',
  VALIDATE = 'VALIDATE',
  DONE = 'DONE',
  FAILED = 'FAILED',
}

export enum LoadPlan {
  ONLINE = 'online',
  OFFLINE = 'offline',
  WIPE = 'wipe',
  SCHEMA = 'schema',
}

/** State sequence of each plan. Any non-terminal state may also go to FAILED. */
export const PLAN_STATES: Readonly<Record<LoadPlan, readonly LoaderState[]>> = {
  [LoadPlan.ONLINE]: [
    LoaderState.IDLE,
    LoaderState.CONFIRM_WIPE,
    LoaderState.WIPE,
    LoaderState.SCHEMA_APPLY,
    LoaderState.LOAD,
    LoaderState.VALIDATE,
    LoaderState.DONE,
  ],
  [LoadPlan.OFFLINE]: [LoaderState.IDLE, LoaderState.LOAD, LoaderState.DONE],
  [LoadPlan.WIPE]: [
    LoaderState.IDLE,
    LoaderState.CONFIRM_WIPE,
    LoaderState.WIPE,
    LoaderState.DONE,
  ],
  [LoadPlan.SCHEMA]: [LoaderState.IDLE, LoaderState.SCHEMA_APPLY, LoaderState.DONE],
};

export function isTerminal(state: LoaderState): boolean {
  return state === LoaderState.DONE || state === LoaderState.FAILED;
}

export function canTransition(plan: LoadPlan, from: LoaderState, to: LoaderState): boolean {
  if (isTerminal(from)) return false;
  if (to === LoaderState.FAILED) return true;
  const states = PLAN_STATES[plan];
  const index = states.indexOf(from);
  return index >= 0 && states[index + 1] === to;
}

export interface StateTransition {
  readonly plan: LoadPlan;
  readonly from: LoaderState;
  readonly to: LoaderState;
  readonly at: string;
  /** Set on transitions to FAILED. */
  readonly reason?: string;
}

/**
 * Current state of one run plus the transitions taken so far. Illegal
 * transitions throw; they indicate a bug in the caller.
 */
export class LoaderStateMachine {
  private current: LoaderState = LoaderState.IDLE;
  private readonly history: StateTransition[] = [];

  constructor(
    readonly plan: LoadPlan,
    private readonly onTransition: (transition: StateTransition) => void = () => undefined,
  ) {}

  get state(): LoaderState {
    return this.current;
  }

  get transitions(): readonly StateTransition[] {
    return this.history;
  }

  /** States still ahead in the plan, the terminal DONE included. */
  remaining(): LoaderState[] {
    const states = PLAN_STATES[this.plan];
    return states.slice(states.indexOf(this.current) + 1);
  }

  advance(to: LoaderState, reason?: string): void {
    if (!canTransition(this.plan, this.current, to)) {
      throw new Error(`Illegal transition ${this.current} -> ${to} in ${this.plan} plan`);
    }
    const transition: StateTransition = {
      plan: this.plan,
      from: this.current,
      to,
      at: new Date().toISOString(),
      ...(reason === undefined ? {} : { reason }),
    };
    this.current = to;
    this.history.push(transition);
    this.onTransition(transition);
  }
}
