export type ComponentErrorCode =
  | "CONNECTIVITY" // remote unreachable or auth rejected
  | "TIMEOUT" // remote call exceeded its deadline
  | "COMMIT_CONFLICT" // pending BMC job blocks a new write
  | "ATTRIBUTE_DEPENDENCY" // attribute group written out of order
  | "ATTRIBUTE_GROUP_CONFLICT" // more than one attribute group in a single write
  | "ATTRIBUTE_REJECTED" // BMC refused the values
  | "INVALID_TRANSITION" // state machine move not in the table
  | "VALIDATION_FAILED" // neither target nor fallback boot device present
  | "PROVISIONING_STEP_FAILED" // a create call failed (details.step)
  | "RESOURCE_EXISTS" // force recreate could not destroy the old resource
  | "CONFIGURATION" // invalid local configuration, caught before remote calls
  | "SECRETS_UNAVAILABLE" // secrets store required but not reachable
  | "INTERNAL";

export type ProvisioningStep = "volume" | "extent" | "target" | "association";

export class ComponentError extends Error {
  constructor(
    public readonly code: ComponentErrorCode,
    message: string,
    public readonly details?: {
      component?: string;
      step?: ProvisioningStep;
      group?: string;
      /** Group whose staged values still await a reboot. */
      pending_group?: string;
      /** Boot order a failed write asked for. */
      order?: string[];
      status?: number;
      job_ids?: string[];
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = "ComponentError";
  }
}

export function isComponentError(err: unknown): err is ComponentError {
  return err instanceof ComponentError;
}

/** Timeouts count as connectivity failures wherever reachability is judged. */
export function isConnectivityFailure(err: unknown): boolean {
  return (
    isComponentError(err) &&
    (err.code === "CONNECTIVITY" || err.code === "TIMEOUT")
  );
}

/** Only a commit conflict may be retried, and only once a reboot has cleared the pending job. */
export function isRetryableAfterReboot(err: unknown): boolean {
  return isComponentError(err) && err.code === "COMMIT_CONFLICT";
}

/** Error kind recorded in phase outcomes; foreign errors become INTERNAL. */
export function errorKindOf(err: unknown): ComponentErrorCode {
  return isComponentError(err) ? err.code : "INTERNAL";
}

export function errorMessageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
