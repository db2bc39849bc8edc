/**
 * Startup environment variable validation.
 *
 * Throws on missing critical vars. Warns on missing recommended vars.
 * Skipped in test environment.
 */
export function validateRequiredEnvVars(): void {
  if (process.env.NODE_ENV === "test") return;

  const errors: string[] = [];
  const warnings: string[] = [];

  // --- Critical (the driver can't reach the controller without these) ---

  const controllerUrl = process.env.CONTROLLER_URL;
  if (!controllerUrl) {
    errors.push("CONTROLLER_URL is required but not set");
  } else if (!/^https?:\/\//.test(controllerUrl)) {
    errors.push("CONTROLLER_URL must start with http:// or https://");
  }

  if (!process.env.CONTROLLER_USERNAME) {
    errors.push("CONTROLLER_USERNAME is required but not set");
  }

  if (!process.env.CONTROLLER_PASSWORD) {
    errors.push("CONTROLLER_PASSWORD is required but not set");
  }

  // --- Recommended ---

  const maxPorts = process.env.MAX_PORTS_PER_SWITCH;
  if (!maxPorts) {
    warnings.push("MAX_PORTS_PER_SWITCH is not set. Logical switches will never span (unbounded).");
  } else if (!/^\d+$/.test(maxPorts)) {
    errors.push("MAX_PORTS_PER_SWITCH must be a non-negative integer");
  }

  // --- Emit ---

  if (warnings.length > 0) {
    for (const w of warnings) {
      console.warn(`[env] WARNING: ${w}`);
    }
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }
}
