import { createHmac } from "node:crypto";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { CanonicalRecord } from "../../core/entities/research";
import type {
  DeliveryReceipt,
  DeliveryTargetPort,
} from "../../core/ports/outboundPorts";
import { HttpClient, toBoundaryError } from "../http/httpClient";

export const signPayload = (secret: string, body: string): string =>
  `sha256=${createHmac("sha256", secret).update(body).digest("hex")}`;

/**
 * POSTs canonical records downstream. The receiver sees the idempotency key on every retry, and a
 * 409 means it already holds the record.
 */
export class WebhookDeliveryTarget implements DeliveryTargetPort {
  readonly name = "webhook";

  constructor(
    private readonly url: string,
    private readonly secret = "",
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpClient(),
  ) {
    if (!this.url.trim()) {
      throw new Error(
        "DELIVERY_WEBHOOK_URL is required when DELIVERY_TARGET is set to webhook.",
      );
    }
  }

  async deliver(
    idempotencyKey: string,
    record: CanonicalRecord,
    signal: AbortSignal,
  ): Promise<Result<DeliveryReceipt, AppBoundaryError>> {
    const body = JSON.stringify({ idempotencyKey, record });
    const headers: Record<string, string> = {
      "content-type": "application/json",
      "idempotency-key": idempotencyKey,
    };
    if (this.secret) {
      headers["x-signature"] = signPayload(this.secret, body);
    }

    const response = await this.httpClient.requestText({
      url: this.url,
      method: "POST",
      headers,
      body,
      timeoutMs: this.timeoutMs,
      signal,
    });

    if (response.isErr()) {
      if (response.error.httpStatus === 409) {
        return ok({ httpStatus: 409, receipt: "already-received" });
      }
      return err(
        toBoundaryError(response.error, { source: "delivery", provider: this.name }),
      );
    }

    const receipt = response.value.text.trim().slice(0, 200);
    return ok({
      httpStatus: response.value.status,
      receipt: receipt || undefined,
    });
  }
}
