import type { Logger } from "pino";

import type { LoanRecord } from "../domain/conversation/types.js";
import { logger } from "../infrastructure/logger.js";
import { renderLoanNotice } from "../presentation/render.js";

export interface LoanNotifier {
  notifyLoanRequest(conversationId: string, record: LoanRecord): Promise<void>;
}

/** Publishes loan notices to the log stream the managers' alerting reads from. */
export function createLogNotifier(tellerName: string, log: Logger = logger): LoanNotifier {
  const notices = log.child({ channel: "manager-notices" });

  return {
    async notifyLoanRequest(conversationId, record) {
      notices.warn(
        {
          conversationId,
          requesterId: record.requesterId,
          managerRoleId: record.managerRoleId,
          amount: record.amount,
          notice: renderLoanNotice(record, tellerName)
        },
        "loan request requires manager attention"
      );
    }
  };
}
