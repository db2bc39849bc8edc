import { z } from "zod";

const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** SDN controller connection. */
  controller: z
    .object({
      url: z.string().url().default("https://127.0.0.1"),
      username: z.string().default("admin"),
      password: z.string().default(""),
    })
    .default({
      url: "https://127.0.0.1",
      username: "admin",
      password: "",
    }),

  /** Logical switch fan-out. */
  switching: z
    .object({
      /** Ports hosted per logical switch before a new one is spanned. 0 = unbounded. */
      maxPortsPerSwitch: z.coerce.number().int().min(0).default(0),
    })
    .default({
      maxPortsPerSwitch: 0,
    }),
});

export type Config = z.infer<typeof configSchema>;

/** Build the config from an environment map. Throws a ZodError on invalid values. */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    controller: {
      url: env.CONTROLLER_URL,
      username: env.CONTROLLER_USERNAME,
      password: env.CONTROLLER_PASSWORD,
    },
    switching: {
      maxPortsPerSwitch: env.MAX_PORTS_PER_SWITCH,
    },
  });
}

export const config = parseConfig(process.env);
