export { createDatabase, type Db, type DatabaseHandle } from "./db.js";
export * from "./schema.js";
export { CurrencyRepo, readCurrencyFile } from "./repos/CurrencyRepo.js";
export { GroupRepo } from "./repos/GroupRepo.js";
export {
  TransactionRepo,
  type GroupSnapshot,
  type NewTransaction,
} from "./repos/TransactionRepo.js";
