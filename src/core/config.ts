/**
 * Runtime flags, read once from the environment at module load.
 *
 * OPSCHEMA_LOG_VERIFY=1 writes every schema verification failure to
 * console.warn. Verification itself never throws, so this is the only way to
 * see which rule rejected an operator without calling `check` directly.
 */

let logVerifyFailures =
  typeof process !== "undefined" && process.env?.OPSCHEMA_LOG_VERIFY === "1";

export function verifyLoggingEnabled(): boolean {
  return logVerifyFailures;
}

export function setVerifyLogging(enabled: boolean): void {
  logVerifyFailures = enabled;
}
