import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { validateRequiredEnvVars } from "./validate-env.js";

describe("validateRequiredEnvVars", () => {
  beforeEach(() => {
    vi.stubEnv("NODE_ENV", "production");
    vi.stubEnv("CONTROLLER_URL", "");
    vi.stubEnv("CONTROLLER_USERNAME", "");
    vi.stubEnv("CONTROLLER_PASSWORD", "");
    vi.stubEnv("MAX_PORTS_PER_SWITCH", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("throws when CONTROLLER_URL is missing", () => {
    vi.stubEnv("CONTROLLER_USERNAME", "admin");
    vi.stubEnv("CONTROLLER_PASSWORD", "test-secret");
    vi.stubEnv("MAX_PORTS_PER_SWITCH", "64");
    expect(() => validateRequiredEnvVars()).toThrow("CONTROLLER_URL is required");
  });

  it("throws when CONTROLLER_URL has no scheme", () => {
    vi.stubEnv("CONTROLLER_URL", "controller.local");
    vi.stubEnv("CONTROLLER_USERNAME", "admin");
    vi.stubEnv("CONTROLLER_PASSWORD", "test-secret");
    vi.stubEnv("MAX_PORTS_PER_SWITCH", "64");
    expect(() => validateRequiredEnvVars()).toThrow("must start with http:// or https://");
  });

  it("throws when controller credentials are missing", () => {
    vi.stubEnv("CONTROLLER_URL", "https://controller.local");
    vi.stubEnv("MAX_PORTS_PER_SWITCH", "64");
    expect(() => validateRequiredEnvVars()).toThrow("CONTROLLER_USERNAME");
    expect(() => validateRequiredEnvVars()).toThrow("CONTROLLER_PASSWORD");
  });

  it("throws when MAX_PORTS_PER_SWITCH is not an integer", () => {
    vi.stubEnv("CONTROLLER_URL", "https://controller.local");
    vi.stubEnv("CONTROLLER_USERNAME", "admin");
    vi.stubEnv("CONTROLLER_PASSWORD", "test-secret");
    vi.stubEnv("MAX_PORTS_PER_SWITCH", "-3");
    expect(() => validateRequiredEnvVars()).toThrow("MAX_PORTS_PER_SWITCH must be a non-negative integer");
  });

  it("warns (does not throw) when MAX_PORTS_PER_SWITCH is missing", () => {
    vi.stubEnv("CONTROLLER_URL", "https://controller.local");
    vi.stubEnv("CONTROLLER_USERNAME", "admin");
    vi.stubEnv("CONTROLLER_PASSWORD", "test-secret");
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(() => validateRequiredEnvVars()).not.toThrow();
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining("MAX_PORTS_PER_SWITCH is not set"));
    warnSpy.mockRestore();
  });

  it("does not throw when all required vars are set", () => {
    vi.stubEnv("CONTROLLER_URL", "https://controller.local");
    vi.stubEnv("CONTROLLER_USERNAME", "admin");
    vi.stubEnv("CONTROLLER_PASSWORD", "test-secret");
    vi.stubEnv("MAX_PORTS_PER_SWITCH", "64");
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(() => validateRequiredEnvVars()).not.toThrow();
    expect(warnSpy).not.toHaveBeenCalled();
    warnSpy.mockRestore();
  });

  it("skips validation in test env", () => {
    vi.stubEnv("NODE_ENV", "test");
    // Nothing set, should not throw
    expect(() => validateRequiredEnvVars()).not.toThrow();
  });
});
