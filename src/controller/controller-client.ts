import type { z } from "zod";
import { logger } from "../config/logger.js";
import { ControllerApiError, MalformedControllerResponse } from "./errors.js";
import { logicalPortRecordSchema, logicalSwitchRecordSchema, objectRefSchema, queryPageSchema } from "./schemas.js";
import type {
  ControllerClient,
  LogicalPortCollection,
  LogicalSwitchCollection,
  QueryFilter,
  QueryHandle,
  TransportZoneCollection,
} from "./types.js";

export const API_PREFIX = "/ws.v1";

export interface HttpControllerClientOptions {
  /** Controller base URL, e.g. https://controller.local:443 */
  baseUrl: string;
  username: string;
  password: string;
}

/**
 * Controller client over the /ws.v1 REST API.
 *
 * Authenticates with a session cookie obtained from /ws.v1/login and logs in
 * again once if the controller answers 401. No other retries are made; every
 * failure propagates to the caller.
 */
export class HttpControllerClient implements ControllerClient {
  readonly switches: LogicalSwitchCollection;
  readonly ports: LogicalPortCollection;
  readonly transportZones: TransportZoneCollection;

  private readonly baseUrl: string;
  private readonly username: string;
  private readonly password: string;
  private sessionCookie: string | null = null;

  constructor(options: HttpControllerClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.username = options.username;
    this.password = options.password;

    this.switches = {
      create: (attrs) => this.send("POST", `${API_PREFIX}/lswitch`, objectRefSchema, attrs),
      query: (filter) => this.query(`${API_PREFIX}/lswitch`, filter, logicalSwitchRecordSchema),
      delete: async (uuid) => {
        await this.request("DELETE", `${API_PREFIX}/lswitch/${uuid}`);
      },
    };

    this.ports = {
      create: (switchUuid, attrs) => this.send("POST", `${API_PREFIX}/lswitch/${switchUuid}/lport`, objectRefSchema, attrs),
      query: (filter) => this.query(`${API_PREFIX}/lswitch/*/lport`, filter, logicalPortRecordSchema),
      delete: async (switchUuid, uuid) => {
        await this.request("DELETE", `${API_PREFIX}/lswitch/${switchUuid}/lport/${uuid}`);
      },
    };

    this.transportZones = {
      query: async (zoneUuid) => {
        const { resultCount } = await this.query(
          `${API_PREFIX}/transport-zone`,
          { uuid: zoneUuid },
          objectRefSchema,
        ).results();
        return { resultCount };
      },
    };
  }

  // --- Private helpers ---

  private query<S extends z.ZodTypeAny>(path: string, filter: QueryFilter, item: S): QueryHandle<z.infer<S>> {
    return {
      results: async () => {
        const results: z.infer<S>[] = [];
        let reported: number | undefined;
        let cursor: string | undefined;

        do {
          const url = `${path}?${queryString(filter, cursor)}`;
          const page = await this.send("GET", url, queryPageSchema);
          for (const raw of page.results) {
            results.push(parseWith(item, raw, path));
          }
          reported = page.result_count ?? reported;
          cursor = page.page_cursor ?? undefined;
        } while (cursor);

        return { results, resultCount: reported ?? results.length };
      },
    };
  }

  private async send<S extends z.ZodTypeAny>(method: string, path: string, schema: S, body?: unknown): Promise<z.infer<S>> {
    const res = await this.request(method, path, body);
    const json: unknown = await res.json();
    return parseWith(schema, json, path);
  }

  private async request(method: string, path: string, body?: unknown, retried = false): Promise<Response> {
    if (!this.sessionCookie) {
      await this.login();
    }

    logger.debug("Controller request", { method, path });
    const res = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: this.headers(),
      ...(body === undefined ? {} : { body: JSON.stringify(body) }),
    });

    if (res.status === 401 && !retried) {
      logger.info("Controller session rejected, logging in again", { method, path });
      this.sessionCookie = null;
      return this.request(method, path, body, true);
    }
    if (!res.ok) {
      throw new ControllerApiError(res.status, await errorMessage(res));
    }
    return res;
  }

  private async login(): Promise<void> {
    const path = `${API_PREFIX}/login`;
    const res = await fetch(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({ username: this.username, password: this.password }).toString(),
    });
    if (!res.ok) {
      throw new ControllerApiError(res.status, await errorMessage(res));
    }

    const cookie = res.headers.get("set-cookie");
    if (!cookie) {
      throw new MalformedControllerResponse(path, "login succeeded without a session cookie");
    }
    const [session] = cookie.split(";");
    this.sessionCookie = session ?? cookie;
    logger.info("Logged in to controller", { baseUrl: this.baseUrl, username: this.username });
  }

  private headers(): Record<string, string> {
    return {
      Cookie: this.sessionCookie ?? "",
      "Content-Type": "application/json",
    };
  }
}

function queryString(filter: QueryFilter, cursor?: string): string {
  const params = new URLSearchParams();
  params.append("fields", "*");
  if (filter.uuid) {
    params.append("uuid", filter.uuid);
  }
  for (const { scope, tag } of filter.tags ?? []) {
    params.append("tag", tag);
    params.append("tag_scope", scope);
  }
  for (const relation of filter.relations ?? []) {
    params.append("relations", relation);
  }
  if (cursor) {
    params.append("_page_cursor", cursor);
  }
  return params.toString();
}

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, path: string): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new MalformedControllerResponse(path, detail);
  }
  return parsed.data;
}

async function errorMessage(res: Response): Promise<string> {
  const text = await res.text().catch(() => "");
  return text || res.statusText;
}
