// QuestDB ILP (InfluxDB Line Protocol) writer for the append-only audit trail
import { Sender } from "@questdb/nodejs-client";

export interface AuditRow {
  tool_name: string;
  invoker: string;
  parameters: string; // JSON string
  result_status: "success" | "failure";
  result_summary: string; // JSON string
  duration_ms: number;
  station?: number | null;
}

export interface AuditSink {
  write(row: AuditRow): Promise<void>;
  close(): Promise<void>;
}

export class IlpAuditSink implements AuditSink {
  private sender: Promise<Sender> | null = null;
  // Rows share one sender buffer, so writes are serialized
  private tail: Promise<void> = Promise.resolve();

  /** @param addr `host:port` of the ILP TCP endpoint, e.g. "localhost:9009" */
  constructor(private readonly addr: string, private readonly table = "audit_trail") {}

  private getSender(): Promise<Sender> {
    if (!this.sender) {
      const s = Sender.fromConfig(`tcp::addr=${this.addr};`);
      this.sender = s.connect().then(() => s);
      // A failed connect is retried on the next write
      void this.sender.catch(() => {
        this.sender = null;
      });
    }
    return this.sender;
  }

  write(row: AuditRow): Promise<void> {
    const next = this.tail.then(() => this.send(row));
    this.tail = next.catch(() => undefined);
    return next;
  }

  private async send(row: AuditRow): Promise<void> {
    const s = await this.getSender();
    s.table(this.table)
      .symbol("tool_name", row.tool_name)
      .symbol("invoker", row.invoker)
      .symbol("result_status", row.result_status);

    if (row.station != null) s.intColumn("station", row.station);

    s.stringColumn("parameters", row.parameters)
      .stringColumn("result_summary", row.result_summary)
      .intColumn("duration_ms", row.duration_ms);

    await s.atNow();
    await s.flush();
  }

  async close(): Promise<void> {
    const pending = this.sender;
    this.sender = null;
    if (!pending) return;
    await this.tail;
    const s = await pending;
    await s.close();
  }
}
