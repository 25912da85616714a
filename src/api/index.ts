import "dotenv/config";
import { loadConfig } from "../config.js";
import { createLogger } from "../logger.js";
import { CurrencyRepo, GroupRepo, TransactionRepo, createDatabase } from "../storage/index.js";
import { BalanceService, GroupService, TransactionService } from "../services/index.js";
import { createApp } from "./app.js";

const config = loadConfig();
const logger = createLogger(config);
const { db, close } = createDatabase(config.DATABASE_PATH);

const currencyRepo = new CurrencyRepo(db);
const groupRepo = new GroupRepo(db);
const transactionRepo = new TransactionRepo(db);

const balanceService = new BalanceService(transactionRepo, groupRepo, currencyRepo, logger);
const transactionService = new TransactionService(transactionRepo, groupRepo, currencyRepo, logger);
const groupService = new GroupService(
  groupRepo,
  currencyRepo,
  balanceService,
  logger,
  config.SETTLE_ALGORITHM
);

await currencyRepo.seed();

const app = createApp({ groupService, transactionService, balanceService, logger });

const server = app.listen(config.PORT, config.HOST, () => {
  logger.info({ port: config.PORT, database: config.DATABASE_PATH }, "ledger API listening");
});

function shutdown(signal: string): void {
  logger.info({ signal }, "shutting down");
  server.close(() => {
    close();
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
