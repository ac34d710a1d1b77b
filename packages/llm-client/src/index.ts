export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens?: number;
  temperature?: number;
}

export interface ChatUsage {
  prompt_tokens?: number;
  completion_tokens: number;
  total_tokens?: number;
}

export interface ChatCompletion {
  id?: string;
  model?: string;
  choices?: { index: number; message: ChatMessage; finish_reason: string | null }[];
  usage: ChatUsage;
}

export interface ChatClient {
  chat(req: ChatRequest): Promise<ChatCompletion>;
}

export interface ClientOptions {
  baseURL: string; // e.g. http://127.0.0.1:30000/v1
  apiKey?: string;
}

/** Server answered with a non-2xx status. */
export class ChatRequestError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`chat completion failed with HTTP ${status}: ${body.slice(0, 200)}`);
    this.name = "ChatRequestError";
  }
}

/** 2xx response whose body is not a chat completion with usage. */
export class MalformedResponseError extends Error {
  constructor(
    message: string,
    readonly body: string,
  ) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function parseChatCompletion(text: string): ChatCompletion {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedResponseError(`response is not JSON: ${reason}`, text);
  }
  if (!isRecord(json)) throw new MalformedResponseError("response is not a JSON object", text);
  const usage = json.usage;
  if (!isRecord(usage) || typeof usage.completion_tokens !== "number") {
    throw new MalformedResponseError("response has no usage.completion_tokens", text);
  }
  return {
    id: typeof json.id === "string" ? json.id : undefined,
    model: typeof json.model === "string" ? json.model : undefined,
    usage: {
      prompt_tokens: typeof usage.prompt_tokens === "number" ? usage.prompt_tokens : undefined,
      completion_tokens: usage.completion_tokens,
      total_tokens: typeof usage.total_tokens === "number" ? usage.total_tokens : undefined,
    },
  };
}

export class OpenAICompatClient implements ChatClient {
  private readonly baseURL: string;

  constructor(private readonly opts: ClientOptions) {
    this.baseURL = opts.baseURL.replace(/\/+$/, "");
  }

  async chat(req: ChatRequest): Promise<ChatCompletion> {
    const { apiKey } = this.opts;
    const res = await fetch(`${this.baseURL}/chat/completions`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        ...(apiKey ? { Authorization: `Bearer ${apiKey}` } : {}),
      },
      body: JSON.stringify(req),
    });
    const text = await res.text();
    if (!res.ok) throw new ChatRequestError(res.status, text);
    return parseChatCompletion(text);
  }
}
