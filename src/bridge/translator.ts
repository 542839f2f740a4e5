// src/bridge/translator.ts — Tool invocations onto upstream completion/model calls

import { Type, type Static, type TSchema } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { CompletionRequest, ModelEntry, UpstreamResult } from "./types.js"
import type { ModelRecord } from "./discovery.js"
import { BridgeError, isBridgeError, type BridgeErrorCode } from "../shared/errors.js"
import { createSilentLogger, type Logger } from "../shared/logger.js"

// --- Tool schemas ---

export const DEFAULT_TEMPERATURE = 0.7
export const DEFAULT_MAX_TOKENS = 1000

export const InferenceParams = Type.Object({
  prompt: Type.String({ description: "Prompt text to complete" }),
  model: Type.String({ description: "Model id as listed by list_models" }),
  temperature: Type.Optional(Type.Number({ minimum: 0, maximum: 2, default: DEFAULT_TEMPERATURE })),
  max_tokens: Type.Optional(Type.Integer({ minimum: 1, default: DEFAULT_MAX_TOKENS })),
})

export const ListModelsParams = Type.Object({})

export interface ToolDescriptor {
  name: string
  description: string
  schema: TSchema
}

export const TOOLS: readonly ToolDescriptor[] = [
  {
    name: "inference",
    description: "Generate a text completion with a model served by the inference backend.",
    schema: InferenceParams,
  },
  {
    name: "list_models",
    description: "List the models the inference backend currently serves.",
    schema: ListModelsParams,
  },
]

// --- Collaborators ---

export interface CompletionBackend {
  createCompletion(request: CompletionRequest): Promise<UpstreamResult<Record<string, unknown>>>
  listModels(): Promise<UpstreamResult<ModelEntry[]>>
}

export interface ModelCatalog {
  hasModels(): boolean
  getModels(): ModelRecord[]
  force(): Promise<number>
}

export interface InvocationRecovery {
  handleError(error: unknown, context?: Record<string, unknown>): Promise<boolean>
}

export type ToolResult =
  | { ok: true; result: Record<string, unknown> }
  | { ok: false; error: BridgeError }

export interface OpenAIError {
  error: {
    message: string
    type: "invalid_request_error" | "api_error"
    code: string
  }
}

const UPSTREAM_CODES: ReadonlySet<BridgeErrorCode> = new Set<BridgeErrorCode>([
  "TRANSPORT_FAILURE",
  "UPSTREAM_CLIENT_ERROR",
  "UPSTREAM_SERVER_ERROR",
  "UPSTREAM_UNAVAILABLE",
  "CIRCUIT_OPEN",
  "INVALID_RESPONSE",
])

export function isUpstreamFailure(error: BridgeError): boolean {
  return UPSTREAM_CODES.has(error.code)
}

/** OpenAI-compatible error body for any thrown or returned error. */
export function toOpenAIError(error: unknown): OpenAIError {
  const message = error instanceof Error ? error.message : String(error)
  if (isBridgeError(error)) {
    if (error.code === "VALIDATION_FAILED" || error.code === "UNKNOWN_TOOL") {
      return { error: { message, type: "invalid_request_error", code: "invalid_request" } }
    }
    if (isUpstreamFailure(error)) {
      return { error: { message, type: "api_error", code: "api_error" } }
    }
  }
  return { error: { message, type: "api_error", code: "internal_error" } }
}

// --- Translator ---

export interface ToolTranslatorOptions {
  backend: CompletionBackend
  catalog: ModelCatalog
  recovery?: InvocationRecovery
  logger?: Logger
}

export class ToolTranslator {
  private readonly backend: CompletionBackend
  private readonly catalog: ModelCatalog
  private readonly recovery?: InvocationRecovery
  private readonly logger: Logger

  constructor(opts: ToolTranslatorOptions) {
    this.backend = opts.backend
    this.catalog = opts.catalog
    this.recovery = opts.recovery
    this.logger = opts.logger ?? createSilentLogger()
  }

  listTools(): ToolDescriptor[] {
    return TOOLS.map((t) => ({ ...t }))
  }

  /**
   * Run one tool. An upstream failure triggers one recovery attempt and, when
   * that succeeds, a single retry.
   */
  async invoke(name: string, parameters: unknown): Promise<ToolResult> {
    this.logger.info(`invoking tool ${name}`)
    const first = await this.dispatch(name, parameters)
    if (first.ok || !isUpstreamFailure(first.error) || !this.recovery) return first

    const recovered = await this.recovery.handleError(first.error, { tool: name })
    if (!recovered) return first

    this.logger.info(`retrying ${name} after successful recovery`)
    return this.dispatch(name, parameters)
  }

  private async dispatch(name: string, parameters: unknown): Promise<ToolResult> {
    switch (name) {
      case "inference":
        return this.inference(parameters)
      case "list_models":
        return this.listModels(parameters)
      default:
        return { ok: false, error: new BridgeError("UNKNOWN_TOOL", `Unknown tool: ${name}`, { context: { tool: name } }) }
    }
  }

  private async inference(parameters: unknown): Promise<ToolResult> {
    const params = validate(InferenceParams, parameters)
    if (!params.ok) return params

    const request: CompletionRequest = {
      model: params.value.model,
      prompt: params.value.prompt,
      temperature: params.value.temperature ?? DEFAULT_TEMPERATURE,
      max_tokens: params.value.max_tokens ?? DEFAULT_MAX_TOKENS,
    }
    const res = await this.backend.createCompletion(request)
    if (!res.ok) {
      this.logger.error("inference failed", res.error)
      return { ok: false, error: res.error }
    }
    return { ok: true, result: mapCompletion(res.data, request.model) }
  }

  private async listModels(parameters: unknown): Promise<ToolResult> {
    const params = validate(ListModelsParams, parameters)
    if (!params.ok) return params

    if (!this.catalog.hasModels()) {
      await this.catalog.force()
    }
    if (this.catalog.hasModels()) {
      return { ok: true, result: { object: "list", data: this.catalog.getModels().map((r) => r.metadata) } }
    }

    // Registry still empty: ask upstream directly so a failure surfaces
    const res = await this.backend.listModels()
    if (!res.ok) {
      this.logger.error("list models failed", res.error)
      return { ok: false, error: res.error }
    }
    return { ok: true, result: { object: "list", data: res.data } }
  }
}

// --- Helpers ---

type Validated<T> = { ok: true; value: T } | { ok: false; error: BridgeError }

function validate<T extends TSchema>(schema: T, input: unknown): Validated<Static<T>> {
  const value = Value.Default(schema, Value.Clone(input ?? {}))
  if (Value.Check(schema, value)) {
    return { ok: true, value }
  }
  const problems = [...Value.Errors(schema, value)].map((e) => `${e.path || "/"}: ${e.message}`)
  return {
    ok: false,
    error: new BridgeError("VALIDATION_FAILED", `Invalid parameters: ${problems.join("; ")}`, {
      context: { problems },
    }),
  }
}

/** Upstream completion body → OpenAI text_completion shape */
export function mapCompletion(body: Record<string, unknown>, model: string): Record<string, unknown> {
  let choices: unknown[] = Array.isArray(body.choices) ? body.choices : []
  if (choices.length === 0) {
    const text = typeof body.text === "string" ? body.text : ""
    choices = [{ text, index: 0, finish_reason: "stop" }]
  }
  const id = typeof body.id === "string" || typeof body.id === "number" ? String(body.id) : "unknown"
  return {
    id: `cmpl-${id}`,
    object: "text_completion",
    created: typeof body.created === "number" ? body.created : 0,
    model,
    choices,
    usage: typeof body.usage === "object" && body.usage !== null ? body.usage : {},
  }
}
