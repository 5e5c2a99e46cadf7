import { mentions, parseAmount, parseChoice, type ChoiceToken } from "../parsing/input.js";
import { computeBusinessReport } from "../tax/calculator.js";
import {
  askDestination,
  askExpenses,
  askPeriod,
  askPlayer,
  askPurpose,
  askReason,
  askTransferAmount,
  prompts,
  taxSummary
} from "./prompts.js";
import type {
  ConversationState,
  LoanFields,
  TaxFields,
  TransferFields,
  Transition,
  TurnContext
} from "./types.js";

type TaxState = Extract<ConversationState, { kind: "TAX_COLLECTING" }>;
type TransferState = Extract<ConversationState, { kind: "TRANSFER_COLLECTING" }>;
type LoanState = Extract<ConversationState, { kind: "LOAN_COLLECTING" }>;

const UNHANDLED_MESSAGE =
  "I'm not sure how to handle that message in the current step. Please follow the prompts, or type 'finish' to end and see the report.";

export const initialState: ConversationState = { kind: "AWAITING_CHOICE" };

function emptyTaxFields(): TaxFields {
  return {
    companyName: null,
    playerName: null,
    income: null,
    expenses: null,
    period: null,
    modifiers: null
  };
}

function emptyTransferFields(): TransferFields {
  return {
    source: null,
    destination: null,
    amount: null,
    reason: null
  };
}

function emptyLoanFields(): LoanFields {
  return {
    playerName: null,
    amount: null,
    purpose: null,
    collateral: null
  };
}

function prompt(state: ConversationState, text: string): Transition {
  return {
    state,
    action: {
      type: "PROMPT",
      text
    }
  };
}

function startLoan(): Transition {
  return prompt({ kind: "LOAN_COLLECTING", step: "ASK_NAME", fields: emptyLoanFields() }, prompts.loanStart);
}

function startTax(): Transition {
  return prompt({ kind: "TAX_COLLECTING", step: "ASK_COMPANY", fields: emptyTaxFields() }, prompts.askCompany);
}

function startTransfer(): Transition {
  return prompt(
    { kind: "TRANSFER_COLLECTING", step: "ASK_SOURCE", fields: emptyTransferFields() },
    prompts.askSource
  );
}

function awaitingChoice(state: ConversationState, choice: ChoiceToken, text: string): Transition {
  if (choice === "PRIMARY_A") {
    return prompt({ kind: "COMPANY_MENU" }, prompts.companyMenu);
  }

  if (choice === "PRIMARY_B") {
    return startLoan();
  }

  // Free-text fallbacks, e.g. "I need company help".
  if (mentions(text, "company")) {
    return prompt({ kind: "COMPANY_MENU" }, prompts.companyMenu);
  }

  if (mentions(text, "loan")) {
    return startLoan();
  }

  return prompt(state, prompts.choiceNotUnderstood);
}

function companyMenu(state: ConversationState, choice: ChoiceToken, text: string): Transition {
  if (choice === "TAX" || mentions(text, "calculate")) {
    return startTax();
  }

  if (choice === "TRANSFER") {
    return startTransfer();
  }

  return prompt(state, prompts.companyMenuNotUnderstood);
}

function finishTax(state: TaxState, context: TurnContext): Transition {
  const { fields } = state;
  const report = computeBusinessReport({
    grossRevenue: fields.income ?? 0,
    expenses: fields.expenses ?? 0,
    settings: context.settings,
    includeDerivedSalary: context.includeDerivedSalary
  });

  return {
    state: { kind: "FINISHED" },
    action: {
      type: "REPORT_READY",
      record: {
        companyName: fields.companyName ?? "Unknown Company",
        playerName: fields.playerName ?? "Unknown",
        period: fields.period ?? "Period",
        modifiers: fields.modifiers ?? "",
        report
      }
    }
  };
}

function taxCollecting(state: TaxState, text: string, context: TurnContext): Transition {
  const { fields } = state;
  const answer = text.trim();

  switch (state.step) {
    case "ASK_COMPANY":
      return prompt(
        { ...state, step: "ASK_PLAYER", fields: { ...fields, companyName: answer } },
        askPlayer(answer)
      );
    case "ASK_PLAYER":
      return prompt({ ...state, step: "ASK_INCOME", fields: { ...fields, playerName: answer } }, prompts.askIncome);
    case "ASK_INCOME": {
      const income = parseAmount(answer);
      if (income === null) {
        return prompt(state, prompts.incomeNotParsed);
      }

      return prompt({ ...state, step: "ASK_EXPENSES", fields: { ...fields, income } }, askExpenses(income));
    }
    case "ASK_EXPENSES": {
      const expenses = parseAmount(answer);
      if (expenses === null) {
        return prompt(state, prompts.expensesNotParsed);
      }

      return prompt({ ...state, step: "ASK_PERIOD", fields: { ...fields, expenses } }, askPeriod(expenses));
    }
    case "ASK_PERIOD":
      return prompt({ ...state, step: "ASK_MODIFIERS", fields: { ...fields, period: answer } }, prompts.askModifiers);
    case "ASK_MODIFIERS": {
      const completed = { ...fields, modifiers: answer };
      return prompt({ ...state, step: "READY", fields: completed }, taxSummary(completed));
    }
    case "READY":
      return finishTax(state, context);
  }
}

function transferCollecting(state: TransferState, text: string): Transition {
  const { fields } = state;
  const answer = text.trim();

  switch (state.step) {
    case "ASK_SOURCE":
      return prompt({ ...state, step: "ASK_DEST", fields: { ...fields, source: answer } }, askDestination(answer));
    case "ASK_DEST":
      return prompt(
        { ...state, step: "ASK_AMOUNT", fields: { ...fields, destination: answer } },
        askTransferAmount(answer)
      );
    case "ASK_AMOUNT": {
      const amount = parseAmount(answer);
      if (amount === null) {
        return prompt(state, prompts.amountNotParsed);
      }

      return prompt({ ...state, step: "ASK_REASON", fields: { ...fields, amount } }, askReason(amount));
    }
    case "ASK_REASON":
      return prompt({ ...state, step: "READY", fields: { ...fields, reason: answer } }, prompts.transferReady);
    case "READY":
      return {
        state: { kind: "FINISHED" },
        action: {
          type: "TRANSFER_READY",
          record: {
            source: fields.source ?? "Unknown",
            destination: fields.destination ?? "Unknown",
            amount: fields.amount ?? 0,
            reason: fields.reason ?? "No reason provided"
          }
        }
      };
  }
}

function loanCollecting(state: LoanState, text: string, context: TurnContext): Transition {
  const { fields } = state;
  const answer = text.trim();

  switch (state.step) {
    case "ASK_NAME":
      return prompt({ ...state, step: "ASK_AMOUNT", fields: { ...fields, playerName: answer } }, prompts.askLoanAmount);
    case "ASK_AMOUNT": {
      const amount = parseAmount(answer);
      if (amount === null) {
        return prompt(state, prompts.amountNotParsed);
      }

      return prompt({ ...state, step: "ASK_PURPOSE", fields: { ...fields, amount } }, askPurpose(amount));
    }
    case "ASK_PURPOSE":
      return prompt(
        { ...state, step: "ASK_COLLATERAL", fields: { ...fields, purpose: answer } },
        prompts.askCollateral
      );
    case "ASK_COLLATERAL":
      return {
        state: { kind: "FINISHED" },
        action: {
          type: "LOAN_READY",
          record: {
            playerName: fields.playerName ?? "Unknown",
            amount: fields.amount ?? 0,
            purpose: fields.purpose ?? "No purpose given",
            collateral: answer || "None",
            requesterId: context.actorId,
            managerRoleId: context.managerRoleId
          }
        }
      };
  }
}

/**
 * Computes the next state and the action for one turn. Never mutates `state`;
 * the caller commits the returned state.
 */
export function advance(state: ConversationState, text: string, context: TurnContext): Transition {
  const choice = parseChoice(text);

  switch (state.kind) {
    case "AWAITING_CHOICE":
      return awaitingChoice(state, choice, text);
    case "COMPANY_MENU":
      return companyMenu(state, choice, text);
    case "TAX_COLLECTING":
      return taxCollecting(state, text, context);
    case "TRANSFER_COLLECTING":
      return transferCollecting(state, text);
    case "LOAN_COLLECTING":
      return loanCollecting(state, text, context);
    case "FINISHED":
      return prompt(state, UNHANDLED_MESSAGE);
  }
}
