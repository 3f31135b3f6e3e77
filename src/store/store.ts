import { Case, CaseStatus, Message, Source } from "../types/contracts.js";

export type NewMessage = Omit<Message, "id" | "caseId">;

/** Operations available inside one transaction. Timestamps are ISO strings in UTC. */
export interface CaseTx {
  isProcessed(externalId: string, source: Source): Promise<boolean>;
  /** A unique-key clash means someone else recorded it first; reported, not thrown. */
  recordProcessed(externalId: string, source: Source, caseId: string | null, at: string): Promise<"recorded" | "duplicate">;

  getCase(caseId: string): Promise<Case | null>;
  findOpenCase(customerIdentifier: string): Promise<Case | null>;
  resolveOrCreateCase(customerIdentifier: string, now: string): Promise<{ case: Case; created: boolean }>;
  listOpenCases(): Promise<Case[]>;

  appendMessage(caseId: string, msg: NewMessage, now: string): Promise<Message>;
  listMessages(caseId: string): Promise<Message[]>;

  /** Sets escalated/escalatedAt once; false when the case was already escalated. */
  markEscalated(caseId: string, at: string): Promise<boolean>;
  markAlerted(caseId: string, at: string): Promise<void>;
  /** False when the case was already closed. */
  closeCase(caseId: string, at: string): Promise<boolean>;
}

export interface Store {
  init(): Promise<void>;
  close(): Promise<void>;
  ping(): Promise<void>;

  /** Runs `fn` inside one serialized write transaction; rolls back when it throws. */
  transaction<T>(fn: (tx: CaseTx) => Promise<T>): Promise<T>;

  getCase(caseId: string): Promise<Case | null>;
  listCases(q: { status?: CaseStatus; limit?: number; offset?: number }): Promise<Case[]>;
  listMessages(caseId: string): Promise<Message[]>;
  deleteCase(caseId: string): Promise<boolean>;

  pruneProcessed(before: string): Promise<number>;
}
