import type { Logger } from "../logger";

export type AuditRecord = {
  user_id: string;
  trace_id: string;
  payload: Record<string, unknown>;
};

export interface AuditSink {
  write(record: AuditRecord, userToken?: string): Promise<void>;
}

export class MemoryAuditSink implements AuditSink {
  readonly records: AuditRecord[] = [];

  async write(record: AuditRecord): Promise<void> {
    this.records.push(record);
  }
}

export type HttpAuditSinkOptions = {
  endpoint: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

/** POSTs `{ trace_id, event_type, payload }` to the audit service. */
export class HttpAuditSink implements AuditSink {
  constructor(private readonly opts: HttpAuditSinkOptions) {}

  async write(record: AuditRecord, userToken?: string): Promise<void> {
    const fetchImpl = this.opts.fetchImpl ?? fetch;
    const res = await fetchImpl(this.opts.endpoint, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        ...(userToken ? { authorization: `Bearer ${userToken}` } : {}),
      },
      body: JSON.stringify({
        trace_id: record.trace_id,
        event_type: "agent_summary",
        payload: { ...record.payload, user_id: record.user_id },
      }),
      signal: AbortSignal.timeout(this.opts.timeoutMs ?? 10_000),
    });
    if (!res.ok) {
      throw new Error(`audit write rejected with ${res.status}`);
    }
  }
}

/** Audit never blocks the response: a failed write is logged and dropped. */
export async function writeAuditBestEffort(
  sink: AuditSink,
  record: AuditRecord,
  log: Logger,
  userToken?: string
): Promise<boolean> {
  try {
    await sink.write(record, userToken);
    return true;
  } catch (err) {
    log.warn(
      { evt: "audit.write_failed", trace_id: record.trace_id, err: err instanceof Error ? err.message : String(err) },
      "audit.write_failed"
    );
    return false;
  }
}
