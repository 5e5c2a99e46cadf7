import type {
  LoanRecord,
  TaxReportRecord,
  TransferRecord,
  TurnAction
} from "../domain/conversation/types.js";
import { sortSchedule, type TaxSchedule, type TaxSettings } from "../domain/rulesets/types.js";
import type { BracketBreakdownEntry } from "../domain/tax/types.js";
import { formatMoney } from "../shared/money.js";
import { formatBracketRange, formatEffectiveRate, formatRate } from "./format.js";

const BANK_NAME = "Universalis Bank";

function footer(tellerName: string): string {
  return `Teller: ${tellerName} | ${BANK_NAME}`;
}

function renderBreakdown(entries: BracketBreakdownEntry[]): string[] {
  return entries.flatMap((entry) => [
    `${formatBracketRange(entry.min, entry.max)} @ ${formatRate(entry.rate)}`,
    `   Tax: ${formatMoney(entry.taxAmount)}`
  ]);
}

export function renderTaxReport(record: TaxReportRecord, tellerName: string): string {
  const { report } = record;
  const lines = [
    `${BANK_NAME.toUpperCase()} - Tax Assessment Report`,
    `${tellerName} prepares your tax assessment for ${record.companyName} (${record.playerName}) - ${record.period}`,
    "",
    `Company: ${record.companyName}`,
    `Client: ${record.playerName}`,
    `Period: ${record.period}`,
    `Gross Income: ${formatMoney(report.grossRevenue)}`,
    `Expenses: ${formatMoney(report.expenses)}`,
    ""
  ];

  if (!report.taxApplies) {
    lines.push(`Net Profit: ${formatMoney(report.netProfit)}`, "No business income tax applies when there is no profit.");
  } else {
    lines.push(
      `Net Profit: ${formatMoney(report.netProfit)}`,
      ...renderBreakdown(report.businessBreakdown),
      `Total Business Tax: ${formatMoney(report.businessTax)} (effective ${formatEffectiveRate(report.businessEffectiveRate)})`,
      `Profit After Tax: ${formatMoney(report.profitAfterTax)}`
    );

    if (report.includeDerivedSalary) {
      lines.push(
        "",
        `CEO Salary (${formatRate(report.derivedSalaryPercent)} of post-tax profit): ${formatMoney(report.grossDerived)}`,
        ...renderBreakdown(report.derivedBreakdown),
        `Salary Tax: ${formatMoney(report.derivedTax)} (effective ${formatEffectiveRate(report.derivedEffectiveRate)})`,
        `Net Salary: ${formatMoney(report.netDerived)}`,
        `Retained Profit: ${formatMoney(report.finalRetained)}`
      );
    }
  }

  lines.push("", footer(tellerName));
  return lines.join("\n");
}

export function renderTransferReport(record: TransferRecord, tellerName: string): string {
  return [
    `${BANK_NAME.toUpperCase()} - Transfer Report`,
    `From: ${record.source}`,
    `To: ${record.destination}`,
    `Amount: ${formatMoney(record.amount)}`,
    `Reason: ${record.reason}`,
    "Status: Completed",
    "",
    footer(tellerName)
  ].join("\n");
}

export function renderLoanNotice(record: LoanRecord, tellerName: string): string {
  const audience = record.managerRoleId ? `Bank Managers (role ${record.managerRoleId})` : "Bank Managers";

  return [
    `${audience}: a new loan request requires your attention.`,
    `${BANK_NAME.toUpperCase()} - Loan Request`,
    `Requester: ${record.playerName} (${record.requesterId})`,
    `Amount: ${formatMoney(record.amount)}`,
    `Purpose: ${record.purpose}`,
    `Collateral: ${record.collateral}`,
    "",
    footer(tellerName)
  ].join("\n");
}

function renderSchedule(schedule: TaxSchedule): string[] {
  return sortSchedule(schedule).map((bracket) => `${formatBracketRange(bracket.min, bracket.max)}: ${formatRate(bracket.rate)}`);
}

export function renderRates(settings: TaxSettings): string {
  return [
    "Business Income Tax Brackets",
    ...renderSchedule(settings.business),
    "",
    "CEO Income Tax Brackets",
    ...renderSchedule(settings.individual),
    "",
    "CEO Salary Rate",
    `${formatRate(settings.derivedSalaryPercent)} of post-tax business profit (adjustable per calculation)`
  ].join("\n");
}

export function renderAction(action: TurnAction, tellerName: string): string {
  switch (action.type) {
    case "PROMPT":
    case "REFUSED":
      return action.text;
    case "REPORT_READY":
      return renderTaxReport(action.record, tellerName);
    case "TRANSFER_READY":
      return renderTransferReport(action.record, tellerName);
    case "LOAN_READY":
      return renderLoanNotice(action.record, tellerName);
  }
}
