import type { ActionKind, ActionPayload, ActionSink, PluginModule, WorkerId } from "@pulsewatch/core";

export const manifest = {
  name: "webhook",
  slot: "sink" as const,
  description: "Action sink: POST enforcement actions to an HTTP endpoint",
  version: "0.1.0",
};

export interface WebhookBody extends ActionPayload {
  workerId: WorkerId;
  action: ActionKind;
}

interface PostOptions {
  token: string | null;
  retries: number;
  retryDelayMs: number;
  timeoutMs: number;
}

/** Result of a single POST. Only 429, 5xx and network failures are worth repeating. */
type Attempt = { ok: true } | { ok: false; retryable: boolean; error: Error };

async function responseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return "<unreadable response body>";
  }
}

async function postOnce(
  url: string,
  headers: Record<string, string>,
  body: string,
  timeoutMs: number,
): Promise<Attempt> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { method: "POST", headers, body, signal: controller.signal });
    if (response.ok) return { ok: true };
    return {
      ok: false,
      retryable: response.status === 429 || response.status >= 500,
      error: new Error(`HTTP ${response.status}: ${await responseText(response)}`),
    };
  } catch (err) {
    return { ok: false, retryable: true, error: err instanceof Error ? err : new Error(String(err)) };
  } finally {
    clearTimeout(timeoutId);
  }
}

/** POST one action, backing off exponentially between attempts. */
async function deliver(url: string, body: WebhookBody, options: PostOptions): Promise<void> {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (options.token) headers["Authorization"] = `Bearer ${options.token}`;
  const json = JSON.stringify(body);

  for (let attempt = 1; ; attempt++) {
    const result = await postOnce(url, headers, json, options.timeoutMs);
    if (result.ok) return;
    if (!result.retryable || attempt > options.retries) {
      throw new Error(
        `webhook ${body.action} for ${body.workerId} failed after ${attempt} attempt(s): ${result.error.message}`,
        { cause: result.error },
      );
    }
    const delay = options.retryDelayMs * 2 ** (attempt - 1);
    await new Promise((resolve) => setTimeout(resolve, delay));
  }
}

function numberOption(value: unknown, fallback: number, min: number): number {
  return typeof value === "number" && Number.isFinite(value) ? Math.max(min, value) : fallback;
}

export function create(config?: Record<string, unknown>): ActionSink {
  const url = config?.["url"];
  if (typeof url !== "string" || url.length === 0) {
    throw new Error("[sink-webhook] 'url' is required");
  }
  const rawToken = config?.["token"];
  const options: PostOptions = {
    token: typeof rawToken === "string" && rawToken.length > 0 ? rawToken : null,
    retries: numberOption(config?.["retries"], 2, 0),
    retryDelayMs: numberOption(config?.["retryDelayMs"], 1000, 0),
    timeoutMs: numberOption(config?.["timeoutMs"], 30_000, 1),
  };

  return {
    name: "webhook",

    async emit(workerId: WorkerId, kind: ActionKind, payload: ActionPayload): Promise<void> {
      await deliver(url, { workerId, action: kind, ...payload }, options);
    },
  };
}

export default { manifest, create } satisfies PluginModule<ActionSink>;
