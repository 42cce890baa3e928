import type { z } from "zod";
import {
  CapabilityError,
  ERROR_CODES,
  InvalidToolArgumentsError,
  errorMessage,
  isAbortError,
  isTransientError,
} from "../errors/index.js";
import type { ObservationError, SessionKey, SessionState } from "../session/types.js";

/** Whether invoking a capability changes stored data */
export type SideEffect = "read" | "mutate";

export interface CapabilityContext {
  /** Name of the agent node invoking the capability */
  agent: string;
  session: SessionKey;
  state: Readonly<SessionState>;
  abortSignal?: AbortSignal;
}

/**
 * A typed operation an agent may invoke. `parameters` carries required and
 * optional fields, defaults and types; arguments are parsed against it before
 * `execute` ever runs.
 */
export interface Capability<S extends z.ZodTypeAny = z.ZodTypeAny, R = unknown> {
  name: string;
  description: string;
  parameters: S;
  sideEffect: SideEffect;
  execute(input: z.output<S>, context: CapabilityContext): Promise<R>;
}

export function defineCapability<S extends z.ZodTypeAny, R>(capability: Capability<S, R>): Capability<S, R> {
  return capability;
}

export type ValidationResult =
  | { ok: true; input: unknown }
  | { ok: false; error: ObservationError };

export type CapabilityOutcome =
  | { ok: true; result: unknown }
  | { ok: false; error: ObservationError };

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Maps anything a capability throws onto an observation the oracle can react to */
export function toObservationError(err: unknown): ObservationError {
  if (err instanceof CapabilityError) return { code: err.code, message: err.message };
  if (isTransientError(err)) return { code: ERROR_CODES.CAPABILITY_TRANSIENT, message: errorMessage(err) };
  return { code: ERROR_CODES.CAPABILITY_FAILED, message: errorMessage(err) };
}

export class CapabilityRegistry {
  private capabilities = new Map<string, Capability>();

  register(capability: Capability) {
    const existing = this.capabilities.get(capability.name);
    if (existing && existing !== capability) {
      throw new Error(`Capability "${capability.name}" is already registered`);
    }
    this.capabilities.set(capability.name, capability);
  }

  get(name: string): Capability | undefined {
    return this.capabilities.get(name);
  }

  has(name: string): boolean {
    return this.capabilities.has(name);
  }

  list(): Capability[] {
    return [...this.capabilities.values()];
  }

  /** Parses arguments against the capability's schema, applying defaults. */
  validate(name: string, args: Record<string, unknown>): ValidationResult {
    const capability = this.capabilities.get(name);
    if (!capability) {
      return { ok: false, error: { code: ERROR_CODES.UNKNOWN_TOOL, message: `Capability not registered: ${name}` } };
    }
    const parsed = capability.parameters.safeParse(args);
    if (!parsed.success) {
      const error = new InvalidToolArgumentsError(name, formatIssues(parsed.error));
      return { ok: false, error: { code: error.code, message: error.message } };
    }
    return { ok: true, input: parsed.data };
  }

  /**
   * Runs a capability on already-validated input. Failures come back as an
   * error outcome; only aborts propagate. Nothing is retried.
   */
  async execute(name: string, input: unknown, context: CapabilityContext): Promise<CapabilityOutcome> {
    const capability = this.capabilities.get(name);
    if (!capability) {
      return { ok: false, error: { code: ERROR_CODES.UNKNOWN_TOOL, message: `Capability not registered: ${name}` } };
    }
    try {
      return { ok: true, result: await capability.execute(input, context) };
    } catch (err: unknown) {
      if (isAbortError(err) || context.abortSignal?.aborted) throw err;
      return { ok: false, error: toObservationError(err) };
    }
  }

  /** Validates then executes. Invalid arguments never reach the capability. */
  async call(name: string, args: Record<string, unknown>, context: CapabilityContext): Promise<CapabilityOutcome> {
    const validation = this.validate(name, args);
    if (!validation.ok) return validation;
    return this.execute(name, validation.input, context);
  }
}
