import { InvalidHookResponse, PhaseNotPermitted } from './errors.js';
import { createHookParams, normalizeAddress, withOutcome, type HookParamsInput } from './params.js';
import {
  HOOK_MAGIC_VALUE,
  isCheckpointable,
  type Checkpointable,
  type ExecutionOutcome,
  type HookContract,
  type HookParams,
  type HookPhase,
} from './types.js';

export type TargetCall = (params: HookParams) => Promise<ExecutionOutcome>;

export interface ExecutionResult extends ExecutionOutcome {
  params: HookParams;
}

export interface HookEngineOptions {
  /** The orchestrator identity every registered hook is bound to. */
  address: string;
  hooks?: HookContract[];
  /** Extra state rolled back together with the hooks, e.g. a token ledger. */
  participants?: Checkpointable[];
}

function hookName(hook: HookContract): string {
  return hook.constructor.name;
}

/**
 * Invokes one phase of one hook and checks the magic value. Refuses phases the
 * hook does not declare.
 */
export async function dispatchPhase(
  hook: HookContract,
  phase: HookPhase,
  params: HookParams,
  sender: string,
): Promise<void> {
  if (!hook.getHookPermissions()[phase]) {
    throw new PhaseNotPermitted(hookName(hook), phase);
  }

  const result = phase === 'beforeExecute'
    ? await hook.beforeExecute(params, sender)
    : await hook.afterExecute(params, sender);

  if (result !== HOOK_MAGIC_VALUE) {
    throw new InvalidHookResponse(hookName(hook), phase, result);
  }
}

/**
 * Reference orchestrator. Runs before hooks, the target call and after hooks
 * in registration order as one unit: any failure restores every checkpoint
 * taken at the start and rethrows. Executions run one at a time in call order.
 */
export class HookEngine {
  readonly address: string;
  private hooks: HookContract[] = [];
  private participants: Checkpointable[];
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: HookEngineOptions) {
    this.address = normalizeAddress('address', options.address);
    this.participants = [...(options.participants ?? [])];
    for (const hook of options.hooks ?? []) this.register(hook);
  }

  register(hook: HookContract): void {
    if (!this.hooks.includes(hook)) this.hooks.push(hook);
  }

  unregister(hook: HookContract): boolean {
    const before = this.hooks.length;
    this.hooks = this.hooks.filter((h) => h !== hook);
    return this.hooks.length !== before;
  }

  list(): HookContract[] {
    return [...this.hooks];
  }

  execute(input: HookParamsInput, target: TargetCall): Promise<ExecutionResult> {
    const run = this.tail.then(() => this.run(input, target));
    // The chain only orders executions; each caller still sees its own rejection.
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async run(input: HookParamsInput, target: TargetCall): Promise<ExecutionResult> {
    const params = createHookParams(input);
    const hooks = [...this.hooks];
    const holders = [...hooks, ...this.participants].filter(isCheckpointable);
    const restores = holders.map((holder) => holder.checkpoint());

    try {
      for (const hook of hooks) {
        if (hook.getHookPermissions().beforeExecute) {
          await dispatchPhase(hook, 'beforeExecute', params, this.address);
        }
      }

      const outcome = await target(params);
      const completed = withOutcome(params, outcome);

      for (const hook of hooks) {
        if (hook.getHookPermissions().afterExecute) {
          await dispatchPhase(hook, 'afterExecute', completed, this.address);
        }
      }

      for (const holder of holders) holder.commit?.();

      return { params: completed, success: outcome.success, returnData: outcome.returnData };
    } catch (e) {
      for (const restore of restores.reverse()) restore();
      throw e;
    }
  }
}
