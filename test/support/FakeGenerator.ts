import type {
  GenerateRequest,
  GenerateResult,
  LlmErrorReason,
  LlmErrorResult,
  StructuredGenerateRequest,
  StructuredGenerator,
  StructuredSchema,
} from "../../lib/llm/types";

export interface RecordedCall {
  schema: string;
  prompt: string;
  temperature?: number;
  provider?: string;
  model?: string;
}

export function llmError(error: LlmErrorReason, rawText: string | null = null): LlmErrorResult {
  return { error, rawText };
}

function isSentinel(value: unknown): value is LlmErrorResult {
  return typeof value === "object" && value !== null && "error" in value && "rawText" in value;
}

/**
 * 以 schema 名稱排隊回應的假 StructuredGenerator。
 * 回應仍經過真正的 zod schema 解析；沒有排隊回應時回傳 empty_response 哨兵值。
 */
export class FakeGenerator implements StructuredGenerator {
  readonly calls: RecordedCall[] = [];
  private readonly queued = new Map<string, unknown[]>();

  reply(schemaName: string, ...payloads: unknown[]): this {
    this.queued.set(schemaName, [...(this.queued.get(schemaName) ?? []), ...payloads]);
    return this;
  }

  callsFor(schemaName: string): RecordedCall[] {
    return this.calls.filter((call) => call.schema === schemaName);
  }

  generate<T>(request: StructuredGenerateRequest<T>): Promise<GenerateResult<T>>;
  generate(request: GenerateRequest): Promise<GenerateResult<string>>;
  async generate<T>(request: GenerateRequest & { schema?: StructuredSchema<T> }): Promise<GenerateResult<T | string>> {
    const schemaName = request.schema?.name ?? "text";
    this.calls.push({
      schema: schemaName,
      prompt: request.prompt,
      temperature: request.temperature,
      provider: request.provider,
      model: request.model,
    });

    const queue = this.queued.get(schemaName) ?? [];
    if (queue.length === 0) {
      return llmError("empty_response");
    }
    const payload = queue.shift();
    if (isSentinel(payload)) {
      return payload;
    }

    if (!request.schema) {
      return { data: String(payload), provider: "googleai", model: "fake-model" };
    }
    const parsed = request.schema.schema.safeParse(payload);
    if (!parsed.success) {
      return llmError("schema_validation", JSON.stringify(payload));
    }
    return { data: parsed.data, provider: "googleai", model: "fake-model" };
  }
}
