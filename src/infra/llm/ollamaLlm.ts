import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { LlmPort } from "../../core/ports/outboundPorts";
import { HttpClient, toBoundaryError } from "../http/httpClient";

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
});

/**
 * Encapsulates chat-model access so field extraction stays portable across LLM hosts.
 */
export class OllamaLlm implements LlmPort {
  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly timeoutMs = 120_000,
    private readonly httpClient = new HttpClient(),
  ) {}

  /**
   * Requests JSON-formatted output; the caller still validates the shape.
   */
  async complete(
    prompt: string,
    signal?: AbortSignal,
  ): Promise<Result<string, AppBoundaryError>> {
    const response = await this.httpClient.requestJson({
      url: `${this.baseUrl.replace(/\/+$/, "")}/api/chat`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: {
        model: this.model,
        stream: false,
        format: "json",
        messages: [{ role: "user", content: prompt }],
      },
      timeoutMs: this.timeoutMs,
      signal,
    });

    if (response.isErr()) {
      return err(
        toBoundaryError(response.error, { source: "provider", provider: "ollama" }),
      );
    }

    const parsed = chatResponseSchema.safeParse(response.value);
    const content = parsed.success ? parsed.data.message.content.trim() : "";
    if (!content) {
      return err({
        source: "provider",
        code: "malformed_response",
        provider: "ollama",
        message: "Ollama chat payload did not contain message.content.",
        retryable: false,
        cause: parsed.success ? undefined : parsed.error.issues,
      });
    }

    return ok(content);
  }
}
