/**
 * Chapa client. Two calls: initialize a hosted checkout, then verify a transaction by reference.
 * Results come back as a tagged union; the coordinator decides what a failure means for the caller.
 */
import axios, { type AxiosInstance } from "axios";
import { z } from "zod";

export type InitializeRequest = {
  amount: string; // two decimals, e.g. "100.00"
  currency: string;
  email: string;
  firstName: string;
  lastName: string;
  txRef: string;
  returnUrl: string;
};

export type InitializeData = { checkoutUrl: string; txRef?: string };
export type VerifyData = { status: string };

export type GatewayResult<T> =
  | { ok: true; data: T }
  /** status 0: no HTTP response at all (DNS, refused, reset) */
  | { ok: false; status: number; reason: string };

export interface PaymentGateway {
  initialize(secretKey: string, req: InitializeRequest): Promise<GatewayResult<InitializeData>>;
  verify(secretKey: string, txRef: string): Promise<GatewayResult<VerifyData>>;
}

const InitializeResponse = z.object({
  data: z.object({
    checkout_url: z.string().min(1),
    tx_ref: z.string().min(1).optional(),
  }),
});

const VerifyResponse = z.object({
  data: z.object({ status: z.string() }),
});

function describe(err: unknown): string {
  if (axios.isAxiosError(err)) return err.code ? `${err.code}: ${err.message}` : err.message;
  return err instanceof Error ? err.message : String(err);
}

export class ChapaGateway implements PaymentGateway {
  private readonly baseUrl: string;
  private readonly http: AxiosInstance;

  constructor(opts: { baseUrl: string; http?: AxiosInstance }) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.http = opts.http ?? axios.create();
  }

  async initialize(secretKey: string, req: InitializeRequest): Promise<GatewayResult<InitializeData>> {
    const body = {
      amount: req.amount,
      currency: req.currency,
      email: req.email,
      first_name: req.firstName,
      last_name: req.lastName,
      tx_ref: req.txRef,
      return_url: req.returnUrl,
    };
    return this.call(
      () =>
        this.http.post<unknown>(`${this.baseUrl}/transaction/initialize`, body, {
          headers: { Authorization: `Bearer ${secretKey}`, "Content-Type": "application/json" },
          validateStatus: () => true,
        }),
      (raw) => {
        const parsed = InitializeResponse.safeParse(raw);
        if (!parsed.success) return null;
        return { checkoutUrl: parsed.data.data.checkout_url, txRef: parsed.data.data.tx_ref };
      }
    );
  }

  async verify(secretKey: string, txRef: string): Promise<GatewayResult<VerifyData>> {
    return this.call(
      () =>
        this.http.get<unknown>(`${this.baseUrl}/transaction/verify/${encodeURIComponent(txRef)}`, {
          headers: { Authorization: `Bearer ${secretKey}` },
          validateStatus: () => true,
        }),
      (raw) => {
        const parsed = VerifyResponse.safeParse(raw);
        return parsed.success ? { status: parsed.data.data.status } : null;
      }
    );
  }

  /** Only an HTTP 200 whose body parses counts as success. */
  private async call<T>(
    send: () => Promise<{ status: number; data: unknown }>,
    read: (raw: unknown) => T | null
  ): Promise<GatewayResult<T>> {
    let res: { status: number; data: unknown };
    try {
      res = await send();
    } catch (err) {
      return { ok: false, status: 0, reason: describe(err) };
    }
    if (res.status !== 200) return { ok: false, status: res.status, reason: `HTTP ${res.status}` };

    const data = read(res.data);
    if (data === null) return { ok: false, status: res.status, reason: "Malformed gateway response" };
    return { ok: true, data };
  }
}
