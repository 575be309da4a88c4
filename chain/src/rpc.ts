import express, { type NextFunction, type Request, type Response } from "express";
import bodyParser from "body-parser";
import type { Server } from "http";
import type { LedgerNode } from "./node.js";
import { ValidationError } from "./validation.js";
import { InvalidPeerAddressError } from "./registry.js";
import { log } from "./log.js";

function isClientError(err: unknown): boolean {
  return err instanceof ValidationError || err instanceof InvalidPeerAddressError;
}

export function createRpcApp(node: LedgerNode) {
  const app = express();
  app.use(bodyParser.json({ limit: "16mb" }));

  app.get("/mine", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const block = await node.mine();
      res.json({
        message: "New Block Forged",
        index: block.index,
        transactions: block.transactions,
        proof: block.proof,
        previousHash: block.previousHash,
      });
    } catch (e) {
      next(e);
    }
  });

  app.post("/transactions/new", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const index = await node.submitTransaction(req.body);
      res.status(201).json({ message: `Transaction will be added to Block ${index}` });
    } catch (e) {
      next(e);
    }
  });

  app.get("/chain", (_req: Request, res: Response) => {
    const chain = node.ledger.chain();
    res.json({ chain, length: chain.length });
  });

  app.post("/nodes/register", (req: Request, res: Response, next: NextFunction) => {
    const nodes: unknown = req.body?.nodes;
    if (!Array.isArray(nodes) || !nodes.every((n): n is string => typeof n === "string")) {
      res.status(400).json({ error: "Please supply a valid list of nodes" });
      return;
    }
    try {
      const totalNodes = node.registerNodes(nodes);
      res.status(201).json({ message: "New nodes have been added", totalNodes });
    } catch (e) {
      next(e);
    }
  });

  app.get("/nodes/resolve", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const { replaced, chain } = await node.resolve();
      res.json(
        replaced
          ? { message: "Our chain was replaced", newChain: chain }
          : { message: "Our chain is authoritative", chain }
      );
    } catch (e) {
      next(e);
    }
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // body-parser reports unparseable JSON with status 400
    const status = isClientError(err) ? 400 : hasStatus(err) ? err.status : 500;
    const message = err instanceof Error ? err.message : String(err);
    if (status >= 500) log.error("RPC request failed", err);
    res.status(status).json({ error: message });
  });

  return app;
}

function hasStatus(err: unknown): err is { status: number } {
  return typeof err === "object" && err !== null && "status" in err && typeof err.status === "number";
}

export function startRpc(node: LedgerNode, port = 5000, host = "0.0.0.0"): Promise<Server> {
  const app = createRpcApp(node);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      log.info(`🌐 Control surface listening on ${host}:${port}`);
      resolve(server);
    });
    server.on("error", reject);
  });
}
