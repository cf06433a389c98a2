// --- Messages ---

export type MessageKind = "critical" | "recovery" | "summary";

export interface Message {
  kind: MessageKind;
  subject: string;
  body: string;
}

// --- Notifier Contract ---

export interface NotifyResult {
  ok: boolean;
  status?: number;
  error?: string;
}

export interface NotifyRequest {
  subject: string;
  body: string;
  recipients: string[];
  signal?: AbortSignal;
}

export interface Notifier {
  readonly name: string;
  send(req: NotifyRequest): Promise<NotifyResult>;
}
