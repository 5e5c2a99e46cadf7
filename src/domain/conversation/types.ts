import type { TaxSettings } from "../rulesets/types.js";
import type { BusinessReport } from "../tax/types.js";

export type TaxStep =
  | "ASK_COMPANY"
  | "ASK_PLAYER"
  | "ASK_INCOME"
  | "ASK_EXPENSES"
  | "ASK_PERIOD"
  | "ASK_MODIFIERS"
  | "READY";

export type TransferStep = "ASK_SOURCE" | "ASK_DEST" | "ASK_AMOUNT" | "ASK_REASON" | "READY";

export type LoanStep = "ASK_NAME" | "ASK_AMOUNT" | "ASK_PURPOSE" | "ASK_COLLATERAL";

export interface TaxFields {
  companyName: string | null;
  playerName: string | null;
  income: number | null;
  expenses: number | null;
  period: string | null;
  modifiers: string | null;
}

export interface TransferFields {
  source: string | null;
  destination: string | null;
  amount: number | null;
  reason: string | null;
}

export interface LoanFields {
  playerName: string | null;
  amount: number | null;
  purpose: string | null;
  collateral: string | null;
}

export type ConversationState =
  | { kind: "AWAITING_CHOICE" }
  | { kind: "COMPANY_MENU" }
  | { kind: "TAX_COLLECTING"; step: TaxStep; fields: TaxFields }
  | { kind: "TRANSFER_COLLECTING"; step: TransferStep; fields: TransferFields }
  | { kind: "LOAN_COLLECTING"; step: LoanStep; fields: LoanFields }
  | { kind: "FINISHED" };

export type ConversationStateKind = ConversationState["kind"];

export interface Session {
  conversationId: string;
  ownerId: string;
  createdAt: number;
  lastActivity: number;
  idleTimeoutMs: number;
  state: ConversationState;
}

export interface TaxReportRecord {
  companyName: string;
  playerName: string;
  period: string;
  modifiers: string;
  report: BusinessReport;
}

export interface TransferRecord {
  source: string;
  destination: string;
  amount: number;
  reason: string;
}

export interface LoanRecord {
  playerName: string;
  amount: number;
  purpose: string;
  collateral: string;
  requesterId: string;
  /** Role to alert about the request; `null` when no manager role is configured. */
  managerRoleId: string | null;
}

export type TurnAction =
  | { type: "PROMPT"; text: string }
  | { type: "REPORT_READY"; record: TaxReportRecord }
  | { type: "TRANSFER_READY"; record: TransferRecord }
  | { type: "LOAN_READY"; record: LoanRecord }
  | { type: "REFUSED"; text: string };

export interface TurnContext {
  actorId: string;
  settings: TaxSettings;
  includeDerivedSalary: boolean;
  managerRoleId: string | null;
}

export interface Transition {
  state: ConversationState;
  action: TurnAction;
}
