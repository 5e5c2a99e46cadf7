import { formatMoney } from "../../shared/money.js";
import type { TaxFields } from "./types.js";

export const REFUSAL_MESSAGE =
  "Please let the original requester interact with this session, or ask an admin for help.";

export function greeting(tellerName: string): string {
  return [
    "Welcome to Universalis Bank.",
    `I am ${tellerName}, your virtual bank teller. How may I assist you today?`,
    "",
    "Please reply with one of the choices below:",
    "A) Company Services: tax calculation or company transfer",
    "B) Loan Request: request a loan (a Bank Manager will be notified)",
    "",
    "You can reply with `A` or `B`, or write the words (e.g. 'company' or 'loan')."
  ].join("\n");
}

export const prompts = {
  choiceNotUnderstood: "I'm sorry, I didn't quite catch that. Please reply with `A` for Company Services or `B` for Loan Request.",
  companyMenu: "Excellent. Company Services it is. Would you like 'tax' (calculate taxes) or 'transfer' (company transfer)?",
  companyMenuNotUnderstood: "Please specify 'tax' or 'transfer' so I know which service to perform.",
  loanStart: "A loan request, understood. To begin, what's your character name?",
  askCompany: "Very well, tax calculation. What is the company name?",
  askIncome: "Great. What is the gross income for the period? (e.g. 12000 or 12k)",
  incomeNotParsed: "I couldn't parse that amount. Please enter a number like 12000 or 12k (you may use 'k' or 'm').",
  expensesNotParsed: "I couldn't parse that amount. Please enter a number like 5000 or 5k.",
  askModifiers: "Any modifiers or special notes? (e.g. 'charity deduction 10%' or reply 'no')",
  askSource: "Understood, company transfer. Who is the source of funds? (e.g. CompanyName or PlayerName)",
  amountNotParsed: "I couldn't parse that amount. Please enter a number like 12000 or 12k.",
  transferReady: "Transfer details recorded. Type `finish` to process and see the transfer report.",
  askLoanAmount: "Thanks. How much would you like to request as a loan?",
  askCollateral: "Any collateral to list? If none, reply 'none'."
} as const;

export function askPlayer(companyName: string): string {
  return `Recorded company name as ${companyName}. What is the character/player name?`;
}

export function askExpenses(income: number): string {
  return `Income recorded: ${formatMoney(income)}. What are the total expenses? (enter 0 if none)`;
}

export function askPeriod(expenses: number): string {
  return `Expenses recorded: ${formatMoney(expenses)}. What is the fiscal period? (e.g. 'This month', 'Q3 1425')`;
}

export function taxSummary(fields: TaxFields): string {
  return [
    "All set. Summary so far:",
    `- Company: ${fields.companyName ?? ""}`,
    `- Player: ${fields.playerName ?? ""}`,
    `- Income: ${formatMoney(fields.income ?? 0)}`,
    `- Expenses: ${formatMoney(fields.expenses ?? 0)}`,
    `- Period: ${fields.period ?? ""}`,
    `- Modifiers: ${fields.modifiers ?? ""}`,
    "",
    "Type `calculate` or `finish` to get the full tax report."
  ].join("\n");
}

export function askDestination(source: string): string {
  return `Source recorded: ${source}. Who is the destination?`;
}

export function askTransferAmount(destination: string): string {
  return `Destination recorded: ${destination}. How much would you like to transfer?`;
}

export function askReason(amount: number): string {
  return `Amount recorded: ${formatMoney(amount)}. Any reason/notes for the transfer? (or 'none')`;
}

export function askPurpose(amount: number): string {
  return `Amount noted: ${formatMoney(amount)}. What's the purpose of the loan?`;
}
