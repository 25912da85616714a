export { BalanceService, type DebtsPreview, type GroupBalances, type SettlePlan } from "./BalanceService.js";
export { GroupService } from "./GroupService.js";
export {
  TransactionService,
  type ExpenseInput,
  type ShareInput,
  type TransactionInput,
  type TransferInput,
} from "./TransactionService.js";
