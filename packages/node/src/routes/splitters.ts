/**
 * Splitter routes.
 *
 * POST /api/v1/splitters  - Create (caller owns it)
 * GET  /api/v1/splitters  - List
 * GET  /api/v1/splitters/:id  - Summary
 * POST /api/v1/splitters/:id/initialize  - Register payees (owner)
 * POST /api/v1/splitters/:id/deposits  - Deposit into the pool
 * POST /api/v1/splitters/:id/release  - Withdraw own share (self)
 * GET  /api/v1/splitters/:id/payees  - List payees
 * GET  /api/v1/splitters/:id/payees/at/:index  - Payee by position
 * GET  /api/v1/splitters/:id/payees/:identity  - Shares, released, pending
 * POST /api/v1/splitters/:id/investors  - Add project fees (owner)
 * GET  /api/v1/splitters/:id/investors  - Investors and fee pool
 * POST /api/v1/splitters/:id/reimburse  - Reimburse investors (owner)
 * POST /api/v1/splitters/:id/owner  - Transfer ownership (owner)
 * GET  /api/v1/splitters/:id/events  - Notification log
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { SplitterRegistry } from "../services/splitter-registry.js";
import {
  AddFeesSchema,
  CreateSplitterSchema,
  DepositSchema,
  InitializeSchema,
  ListEventsQuerySchema,
  PayeeIndexParamSchema,
  ReleaseSchema,
  TransferOwnershipSchema,
} from "../types/dto.js";
import { ApiError } from "../types/error.js";
import { formatZodErrors, readBody, readQuery } from "../middleware/validate.js";

export function createSplitterRoutes(registry: SplitterRegistry): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/splitters - Create
  routes.post("/", async (c) => {
    const body = await readBody(c, CreateSplitterSchema);
    const service = registry.create(c.get("caller").identity, body);
    return c.json({ data: service.view() }, 201);
  });

  // GET /api/v1/splitters - List
  routes.get("/", (c) => {
    return c.json({ data: registry.list() });
  });

  // GET /api/v1/splitters/:id - Summary
  routes.get("/:id", (c) => {
    return c.json({ data: registry.get(c.req.param("id")).view() });
  });

  // POST /api/v1/splitters/:id/initialize
  routes.post("/:id/initialize", async (c) => {
    const service = registry.get(c.req.param("id"));
    const body = await readBody(c, InitializeSchema);

    const payees = service.initialize(c.get("caller").identity, body.identities, body.shares);
    return c.json({ data: { payees, totalShares: service.splitter.totalShares() } }, 201);
  });

  // POST /api/v1/splitters/:id/deposits
  routes.post("/:id/deposits", async (c) => {
    const service = registry.get(c.req.param("id"));
    const body = await readBody(c, DepositSchema);

    const deposit = service.deposit(c.get("caller").identity, body.amount);
    return c.json({ data: deposit }, 201);
  });

  // POST /api/v1/splitters/:id/release
  routes.post("/:id/release", async (c) => {
    const service = registry.get(c.req.param("id"));
    const body = await readBody(c, ReleaseSchema);
    const caller = c.get("caller").identity;

    const release = service.release(caller, body.identity ?? caller);
    return c.json({ data: release });
  });

  // GET /api/v1/splitters/:id/payees
  routes.get("/:id/payees", (c) => {
    const service = registry.get(c.req.param("id"));
    return c.json({
      data: service.splitter.listPayees(),
      totalShares: service.splitter.totalShares(),
    });
  });

  // GET /api/v1/splitters/:id/payees/at/:index
  routes.get("/:id/payees/at/:index", (c) => {
    const service = registry.get(c.req.param("id"));
    const index = PayeeIndexParamSchema.safeParse(c.req.param("index"));
    if (!index.success) {
      throw new ApiError("VALIDATION_ERROR", 400, "Payee index must be a non-negative integer", {
        issues: formatZodErrors(index.error),
      });
    }
    return c.json({ data: service.splitter.payeeAt(index.data) });
  });

  // GET /api/v1/splitters/:id/payees/:identity
  routes.get("/:id/payees/:identity", (c) => {
    const service = registry.get(c.req.param("id"));
    return c.json({ data: service.payee(c.req.param("identity")) });
  });

  // POST /api/v1/splitters/:id/investors
  routes.post("/:id/investors", async (c) => {
    const service = registry.get(c.req.param("id"));
    const body = await readBody(c, AddFeesSchema);

    const record = service.addProjectFees(c.get("caller").identity, body.investor, body.amount);
    return c.json({ data: record }, 201);
  });

  // GET /api/v1/splitters/:id/investors
  routes.get("/:id/investors", (c) => {
    const service = registry.get(c.req.param("id"));
    return c.json({
      data: service.splitter.listInvestors(),
      feePoolTotal: service.splitter.feePoolTotal(),
    });
  });

  // POST /api/v1/splitters/:id/reimburse
  routes.post("/:id/reimburse", (c) => {
    const service = registry.get(c.req.param("id"));

    const reimbursements = service.reimburseProjectFees(c.get("caller").identity);
    return c.json({
      data: reimbursements,
      feePoolTotal: service.splitter.feePoolTotal(),
    });
  });

  // POST /api/v1/splitters/:id/owner
  routes.post("/:id/owner", async (c) => {
    const service = registry.get(c.req.param("id"));
    const body = await readBody(c, TransferOwnershipSchema);

    service.transferOwnership(c.get("caller").identity, body.newOwner);
    return c.json({ data: { owner: service.splitter.owner() } });
  });

  // GET /api/v1/splitters/:id/events
  routes.get("/:id/events", (c) => {
    const service = registry.get(c.req.param("id"));
    const query = readQuery(c, ListEventsQuerySchema);
    return c.json({ data: service.events(query) });
  });

  return routes;
}
