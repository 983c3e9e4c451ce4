/**
 * Step Registry - immutable mapping from step names to handlers, and from
 * declared intent to the ordered step list.
 *
 * Built once at startup and shared by reference; it has no mutators.
 */

import { RelayError } from "../errors.js";
import type { CapabilityProvider } from "../capabilities/types.js";
import {
  STEP_NAMES,
  isStepName,
  type ExecutionMode,
  type IntentFlag,
  type ResolvedStep,
  type StepName
} from "../tasks/types.js";

export type LocalBinding = {
  mode: "local";
  provider: CapabilityProvider;
};

export type DelegatedBinding = {
  mode: "delegated";
  /** Name of the counterparty registered with the delegation channel */
  counterparty: string;
};

export type StepBinding = LocalBinding | DelegatedBinding;

export type StepDefinition = {
  name: StepName;
  local?: CapabilityProvider;
  delegated?: { counterparty: string };
};

/**
 * Which step (and how it executes) an intent flag asks for.
 */
export type IntentRule = {
  flag: IntentFlag;
  step: StepName;
  mode: ExecutionMode;
};

export const DEFAULT_INTENT_RULES: readonly IntentRule[] = [
  { flag: "translate", step: "translate", mode: "local" },
  { flag: "text2speech-local", step: "text2speech", mode: "local" },
  { flag: "text2speech-delegated", step: "text2speech", mode: "delegated" }
];

type BindingSet = {
  readonly local?: LocalBinding;
  readonly delegated?: DelegatedBinding;
};

export class StepRegistry {
  private readonly bindings: ReadonlyMap<StepName, BindingSet>;
  private readonly rules: ReadonlyMap<IntentFlag, IntentRule>;

  constructor(definitions: readonly StepDefinition[], rules: readonly IntentRule[] = DEFAULT_INTENT_RULES) {
    const bindings = new Map<StepName, BindingSet>();
    for (const def of definitions) {
      if (bindings.has(def.name)) {
        throw new RelayError("BAD_REQUEST", `Step ${def.name} is registered twice`);
      }
      const set: { local?: LocalBinding; delegated?: DelegatedBinding } = {};
      if (def.local) set.local = { mode: "local", provider: def.local };
      if (def.delegated) set.delegated = { mode: "delegated", counterparty: def.delegated.counterparty };
      if (!set.local && !set.delegated) {
        throw new RelayError("BAD_REQUEST", `Step ${def.name} has no local handler and no counterparty`);
      }
      bindings.set(def.name, Object.freeze(set));
    }
    this.bindings = bindings;
    this.rules = new Map(rules.map((r) => [r.flag, Object.freeze({ ...r })]));
    Object.freeze(this);
  }

  /**
   * Resolve declared intent into the minimal ordered step list.
   * Order follows the pipeline (translate before text2speech), not the order
   * the flags were given in.
   *
   * @throws RelayError UNKNOWN_STEP if a flag has no rule, the rule's step has
   * no binding for the requested mode, or two flags disagree on a step's mode.
   */
  resolve(intent: readonly IntentFlag[]): readonly ResolvedStep[] {
    const chosen = new Map<StepName, ExecutionMode>();

    for (const flag of intent) {
      const rule = this.rules.get(flag);
      if (!rule) {
        throw new RelayError("UNKNOWN_STEP", `No step is registered for intent '${flag}'`, { flag });
      }
      const existing = chosen.get(rule.step);
      if (existing !== undefined && existing !== rule.mode) {
        throw new RelayError(
          "UNKNOWN_STEP",
          `Intent asks for step '${rule.step}' both ${existing} and ${rule.mode}`,
          { step: rule.step, modes: [existing, rule.mode] }
        );
      }
      // Throws UNKNOWN_STEP when the step or mode is not registered
      this.lookup(rule.step, rule.mode);
      chosen.set(rule.step, rule.mode);
    }

    return Object.freeze(
      STEP_NAMES.flatMap((name): ResolvedStep[] => {
        const mode = chosen.get(name);
        return mode === undefined ? [] : [{ name, mode }];
      })
    );
  }

  /**
   * Find the handler for a step. Without a mode, the local binding is
   * preferred.
   */
  lookup(name: string, mode?: ExecutionMode): StepBinding {
    const set = this.findBindings(name);
    const binding = mode === undefined ? (set?.local ?? set?.delegated) : set?.[mode];
    if (!binding) {
      throw new RelayError(
        "UNKNOWN_STEP",
        mode ? `Step '${name}' has no ${mode} handler` : `Step '${name}' is not registered`,
        { step: name, ...(mode !== undefined && { mode }) }
      );
    }
    return binding;
  }

  has(name: string, mode?: ExecutionMode): boolean {
    const set = this.findBindings(name);
    if (!set) return false;
    return mode === undefined ? true : set[mode] !== undefined;
  }

  names(): StepName[] {
    return STEP_NAMES.filter((name) => this.bindings.has(name));
  }

  /**
   * The intent flag that asks for `step` in `mode`, when one is registered
   * and the step has a binding for that mode.
   */
  flagFor(step: StepName, mode: ExecutionMode): IntentFlag | undefined {
    if (!this.has(step, mode)) return undefined;
    for (const rule of this.rules.values()) {
      if (rule.step === step && rule.mode === mode) return rule.flag;
    }
    return undefined;
  }

  private findBindings(name: string): BindingSet | undefined {
    return isStepName(name) ? this.bindings.get(name) : undefined;
  }
}
