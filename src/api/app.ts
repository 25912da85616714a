import express, { type Express, type Request, type RequestHandler, type Response } from "express";
import type { BalanceService, GroupService, TransactionService } from "../services/index.js";
import { ValidationError } from "../errors.js";
import type { Logger } from "../logger.js";
import { errorHandler, createErrorEnvelope } from "./errors.js";
import { renderBalances, renderSettlePlan } from "./render.js";
import {
  DebtsPreviewQuerySchema,
  GroupBodySchema,
  MemberBodySchema,
  SettleUpQuerySchema,
  TransactionBodySchema,
  parseInput,
} from "./schemas.js";

export interface AppDependencies {
  groupService: GroupService;
  transactionService: TransactionService;
  balanceService: BalanceService;
  logger: Logger;
}

function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

// No authentication here: the acting user comes from x-user-id
function requireUserId(req: Request): string {
  const userId = req.header("x-user-id")?.trim();
  if (!userId) {
    throw new ValidationError("Missing x-user-id header", { field: "x-user-id" });
  }
  return userId;
}

export function createApp(deps: AppDependencies): Express {
  const { groupService, transactionService, balanceService, logger } = deps;
  const app = express();

  app.use(express.json());

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      logger.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - start,
        },
        "request"
      );
    });
    next();
  });

  // Health check
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // ===== Groups and members =====

  app.post(
    "/groups",
    route(async (req, res) => {
      const creatorId = requireUserId(req);
      const body = parseInput(GroupBodySchema, req.body);
      const group = await groupService.createGroup({ ...body, creatorId });
      res.status(201).json(group);
    })
  );

  app.get(
    "/groups/:id",
    route(async (req, res) => {
      res.json(await groupService.getGroup(req.params.id));
    })
  );

  app.post(
    "/groups/:id/members",
    route(async (req, res) => {
      const { userId } = parseInput(MemberBodySchema, req.body);
      res.json(await groupService.addMember(req.params.id, userId));
    })
  );

  app.delete(
    "/groups/:id/members/:userId",
    route(async (req, res) => {
      await groupService.removeMember(req.params.id, req.params.userId);
      res.status(204).end();
    })
  );

  // ===== Transactions =====

  app.post(
    "/groups/:id/transactions",
    route(async (req, res) => {
      const authorId = requireUserId(req);
      const input = parseInput(TransactionBodySchema, req.body);
      const tx = await transactionService.createTransaction(req.params.id, authorId, input);
      res.status(201).json(tx);
    })
  );

  app.get(
    "/groups/:id/transactions",
    route(async (req, res) => {
      res.json(await transactionService.getGroupTransactions(req.params.id));
    })
  );

  app.put(
    "/transactions/:id",
    route(async (req, res) => {
      const input = parseInput(TransactionBodySchema, req.body);
      res.json(await transactionService.replaceTransaction(req.params.id, input));
    })
  );

  app.delete(
    "/transactions/:id",
    route(async (req, res) => {
      await transactionService.deleteTransaction(req.params.id);
      res.status(204).end();
    })
  );

  // ===== Balances / settle-up =====

  app.get(
    "/groups/:id/balances",
    route(async (req, res) => {
      res.json(renderBalances(await balanceService.getGroupBalances(req.params.id)));
    })
  );

  app.get(
    "/groups/:id/balances/:userId/:friendId",
    route(async (req, res) => {
      const { id, userId, friendId } = req.params;
      res.json(await balanceService.getPairBalance(id, userId, friendId));
    })
  );

  app.get(
    "/groups/:id/settle-up",
    route(async (req, res) => {
      const query = parseInput(SettleUpQuerySchema, req.query);
      res.json(renderSettlePlan(await balanceService.getSettlePlan(req.params.id, query)));
    })
  );

  app.get(
    "/groups/:id/debts",
    route(async (req, res) => {
      res.json({ hasDebts: await balanceService.hasDebts(req.params.id) });
    })
  );

  app.get(
    "/users/:id/debts-preview",
    route(async (req, res) => {
      const { groupIds } = parseInput(DebtsPreviewQuerySchema, req.query);
      res.json(await balanceService.getDebtsPreview(req.params.id, groupIds));
    })
  );

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json(createErrorEnvelope("NOT_FOUND", "Endpoint not found"));
  });

  app.use(errorHandler(logger));

  return app;
}
