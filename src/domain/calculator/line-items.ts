import { CalculationError } from "../../shared/errors.js";
import { isDiceFaces, type DiceFaces } from "../parsing/input.js";
import type { TaxSettings } from "../rulesets/types.js";
import { computeBusinessReport } from "../tax/calculator.js";
import type { BusinessReport } from "../tax/types.js";
import { defaultRandomSource, rollQuantity, type RandomSource } from "./dice.js";

export const MAX_LINE_ITEMS = 10;

export interface LineItem {
  name: string;
  unitPrice: number;
  diceFaces: DiceFaces;
  rolledQuantity: number;
}

export interface LineItemReport {
  items: LineItem[];
  report: BusinessReport;
}

export function lineItemRevenue(item: LineItem): number {
  return item.unitPrice * item.rolledQuantity;
}

/**
 * Working set for one calculator run. Each added product rolls its sale quantity
 * once; the report is computed from the accumulated revenue.
 */
export class CalculationContext {
  private readonly lineItems: LineItem[] = [];

  constructor(private readonly random: RandomSource = defaultRandomSource) {}

  get items(): readonly LineItem[] {
    return this.lineItems;
  }

  get grossRevenue(): number {
    return this.lineItems.reduce((sum, item) => sum + lineItemRevenue(item), 0);
  }

  addItem(name: string, unitPrice: number, faces: number): LineItem {
    if (this.lineItems.length >= MAX_LINE_ITEMS) {
      throw new CalculationError("TOO_MANY_ITEMS", `A calculation holds at most ${MAX_LINE_ITEMS} items.`);
    }

    const trimmedName = name.trim();
    if (!trimmedName) {
      throw new CalculationError("ITEM_NAME_REQUIRED", "Each item needs a name.");
    }

    if (!Number.isFinite(unitPrice) || unitPrice <= 0) {
      throw new CalculationError("ITEM_PRICE_INVALID", `Price for ${trimmedName} must be greater than zero.`);
    }

    if (!isDiceFaces(faces)) {
      throw new CalculationError("DICE_NOT_ALLOWED", `A d${faces} is not one of the allowed dice.`);
    }

    const item: LineItem = {
      name: trimmedName,
      unitPrice,
      diceFaces: faces,
      rolledQuantity: rollQuantity(faces, this.random)
    };
    this.lineItems.push(item);
    return item;
  }

  removeItem(index: number): LineItem | null {
    if (!Number.isInteger(index) || index < 0 || index >= this.lineItems.length) {
      return null;
    }

    const [removed] = this.lineItems.splice(index, 1);
    return removed ?? null;
  }

  computeReport(options: {
    settings: TaxSettings;
    expenses: number;
    includeDerivedSalary: boolean;
    derivedSalaryPercent?: number;
  }): LineItemReport {
    if (this.lineItems.length === 0) {
      throw new CalculationError("NO_ITEMS", "Add at least one item before calculating.");
    }

    if (!Number.isFinite(options.expenses) || options.expenses < 0) {
      throw new CalculationError("EXPENSES_INVALID", "Expenses must be zero or greater.");
    }

    return {
      items: [...this.lineItems],
      report: computeBusinessReport({
        grossRevenue: this.grossRevenue,
        expenses: options.expenses,
        settings: options.settings,
        includeDerivedSalary: options.includeDerivedSalary,
        derivedSalaryPercent: options.derivedSalaryPercent
      })
    };
  }
}
