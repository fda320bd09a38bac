import { UpstreamError } from "./errors.js";
import type { Logger } from "./log.js";
import type { Flow, Language } from "./session.js";

export const PAYMENT_CURRENCY = "XTR";

export type InvoiceFrame = {
  type: "invoice";
  userId: string;
  amount: number;
  currency: string;
  payload: string;
  language: Language;
};

export type PaymentClient = {
  requestPayment: (userId: string, amount: number, language: Language, flow: Flow) => Promise<void>;
};

/**
 * Invoices travel over the user's own socket; the client answers with a
 * `payment_confirmed` action once the charge succeeds.
 */
export const createPaymentClient = ({
  sendInvoice,
  logger,
}: {
  sendInvoice: (frame: InvoiceFrame) => boolean;
  logger: Logger;
}): PaymentClient => ({
  async requestPayment(userId, amount, language, flow) {
    const frame: InvoiceFrame = {
      type: "invoice",
      userId,
      amount,
      currency: PAYMENT_CURRENCY,
      payload: `reading:${flow}:${userId}:${Date.now()}`,
      language,
    };
    if (!sendInvoice(frame)) {
      throw new UpstreamError("payment", `no open connection for user ${userId}`);
    }
    logger.info("invoice sent", { userId, amount, currency: PAYMENT_CURRENCY, flow });
  },
});
