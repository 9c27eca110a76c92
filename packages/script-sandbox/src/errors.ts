export type ScriptFailureKind =
  | "ScriptRuntimeError"
  | "SandboxViolation"
  | "Timeout"
  | "ResourceLimit"
  | "GenerationFailed";

export interface ScriptFailure {
  kind: ScriptFailureKind;
  message: string;
  trace?: string;
}

export class GenerationFailedError extends Error {
  readonly kind = "GenerationFailed";

  constructor(message: string) {
    super(message);
    this.name = "GenerationFailedError";
  }
}

/** Raised inside a capability when a script passes arguments it can't take. */
export class CapabilityArgumentError extends Error {
  readonly capability: string;

  constructor(capability: string, message: string) {
    super(`${capability}: ${message}`);
    this.name = "CapabilityArgumentError";
    this.capability = capability;
  }
}
