import { GoogleGenerativeAI } from "@google/generative-ai";
import { z } from "zod";
import type { AppConfig, LlmProvider } from "./config";
import { GenerationError, toErrorMessage } from "./errors";

export interface LanguageModel {
  readonly name: string;
  generate(prompt: string, opts?: { temperature?: number; json?: boolean }): Promise<string>;
}

export class GeminiModel implements LanguageModel {
  readonly name: string;
  private readonly genAI: GoogleGenerativeAI;

  constructor(private readonly model: string, apiKey: string) {
    this.name = `gemini:${model}`;
    this.genAI = new GoogleGenerativeAI(apiKey);
  }

  async generate(prompt: string, opts: { temperature?: number; json?: boolean } = {}) {
    const model = this.genAI.getGenerativeModel({
      model: this.model,
      generationConfig: {
        temperature: opts.temperature ?? 0,
        responseMimeType: opts.json ? "application/json" : undefined,
      },
    });
    const resp = await model.generateContent(prompt);
    return resp.response.text() ?? "";
  }
}

const deepSeekResponseSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }).optional() }))
    .default([]),
});

export class DeepSeekModel implements LanguageModel {
  readonly name: string;

  constructor(
    private readonly model: string,
    private readonly apiKey: string,
    private readonly baseUrl = "https://api.deepseek.com/v1"
  ) {
    this.name = `deepseek:${model}`;
  }

  async generate(prompt: string, opts: { temperature?: number; json?: boolean } = {}) {
    const resp = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model || "deepseek-chat",
        messages: [
          { role: "system", content: "You are a helpful financial research assistant." },
          { role: "user", content: prompt },
        ],
        temperature: opts.temperature ?? 0.2,
        ...(opts.json ? { response_format: { type: "json_object" } } : {}),
      }),
    });
    if (!resp.ok) throw new Error(`DeepSeek error: ${resp.status}`);
    const data = deepSeekResponseSchema.parse(await resp.json());
    return data.choices[0]?.message?.content ?? "";
  }
}

/** Tries the primary model, then the alternate one when the primary throws. */
export class FallbackModel implements LanguageModel {
  readonly name: string;

  constructor(private readonly primary: LanguageModel, private readonly alternate?: LanguageModel) {
    this.name = alternate ? `${primary.name}|${alternate.name}` : primary.name;
  }

  async generate(prompt: string, opts?: { temperature?: number; json?: boolean }) {
    try {
      return await this.primary.generate(prompt, opts);
    } catch (e) {
      if (!this.alternate) throw e;
      console.warn(`LLM ${this.primary.name} failed, falling back to ${this.alternate.name}:`, toErrorMessage(e));
      return await this.alternate.generate(prompt, opts);
    }
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimeoutError";
  }
}

export async function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  let to: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, rej) => {
    to = setTimeout(() => rej(new TimeoutError(`${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([p, timeout]);
  } finally {
    clearTimeout(to);
  }
}

/** Runs a model call under a deadline; any failure becomes a GenerationError. */
export async function generateBounded(
  llm: LanguageModel,
  prompt: string,
  timeoutMs: number,
  opts?: { temperature?: number; json?: boolean }
): Promise<string> {
  try {
    return await withTimeout(llm.generate(prompt, opts), timeoutMs, `LLM ${llm.name}`);
  } catch (e) {
    throw new GenerationError(`Language model call failed: ${toErrorMessage(e)}`, { cause: e, details: { model: llm.name } });
  }
}

function modelFor(provider: LlmProvider, model: string | undefined, cfg: AppConfig): LanguageModel | undefined {
  if (provider === "gemini") {
    return cfg.googleApiKey ? new GeminiModel(model || "gemini-1.5-flash", cfg.googleApiKey) : undefined;
  }
  return cfg.deepseekApiKey ? new DeepSeekModel(model || "deepseek-chat", cfg.deepseekApiKey) : undefined;
}

function createModel(provider: LlmProvider, model: string, cfg: AppConfig): LanguageModel {
  const primary = modelFor(provider, model, cfg);
  if (!primary) {
    throw new Error(`${provider === "gemini" ? "GOOGLE_API_KEY" : "DEEPSEEK_API_KEY"} missing for ${provider}`);
  }
  const alternate = modelFor(provider === "gemini" ? "deepseek" : "gemini", undefined, cfg);
  return new FallbackModel(primary, alternate);
}

export function createAnswerModel(cfg: AppConfig): LanguageModel {
  return createModel(cfg.llmProvider, cfg.llmModel, cfg);
}

export function createChartModel(cfg: AppConfig): LanguageModel {
  const provider = cfg.llmProviderChart || cfg.llmProvider;
  const model = cfg.llmModelChart || (provider === cfg.llmProvider ? cfg.llmModel : "");
  return createModel(provider, model, cfg);
}
