export type VmmErrorKind = "configuration" | "process" | "api" | "vmm";

/**
 * Base class for every failure the manager raises on purpose. `kind` lets callers
 * switch on the failure without `instanceof` chains.
 */
export abstract class VmmBaseError extends Error {
  abstract readonly kind: VmmErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or missing input, or a control-API configuration step that failed. */
export class ConfigurationError extends VmmBaseError {
  readonly kind = "configuration";
  public readonly field?: string;

  constructor(message: string, options?: { field?: string; cause?: unknown }) {
    super(message, options);
    this.field = options?.field;
  }
}

/** The hypervisor process went away when it was expected to be alive. */
export class ProcessError extends VmmBaseError {
  readonly kind = "process";
}

/** The control socket never appeared, or a control-API call failed. */
export class APIError extends VmmBaseError {
  readonly kind = "api";
  public readonly method?: string;
  public readonly statusCode?: number;

  constructor(message: string, options?: { method?: string; statusCode?: number; cause?: unknown }) {
    super(message, options);
    this.method = options?.method;
    this.statusCode = options?.statusCode;
  }
}

/** Lifecycle-level failure: network, registry, rollback. */
export class VMMError extends VmmBaseError {
  readonly kind = "vmm";
}

export class NameConflictError extends VMMError {
  constructor(public readonly vmName: string) {
    super(`VMM with name ${vmName} already exists`);
  }
}

export class VmNotFoundError extends VMMError {
  constructor(public readonly vmId: string) {
    super(`VMM with ID ${vmId} not found`);
  }
}

export class IpExhaustedError extends VMMError {
  constructor(public readonly subnet: string) {
    super(`Could not find an available IP address in ${subnet}`);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
