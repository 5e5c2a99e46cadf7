import cors from "@fastify/cors";
import fastifyJwt from "@fastify/jwt";
import fastifyRateLimit from "@fastify/rate-limit";
import sensible from "@fastify/sensible";
import Fastify from "fastify";
import { ZodError } from "zod";

import { getActor, requireAdmin, requireAuth } from "./api/auth.js";
import { buildOpenApiDocument } from "./api/openapi.js";
import {
  beginConversationSchema,
  bracketSchema,
  calculationSchema,
  conversationParamsSchema,
  derivedSalarySchema,
  removeBracketParamsSchema,
  scheduleParamsSchema,
  turnSchema
} from "./api/schemas.js";
import { env } from "./config/env.js";
import { defaultRandomSource, type RandomSource } from "./domain/calculator/dice.js";
import { CalculationContext, lineItemRevenue } from "./domain/calculator/line-items.js";
import { SessionStore } from "./domain/conversation/session-store.js";
import { parseDiceFaces } from "./domain/parsing/input.js";
import { toStoredSettings } from "./domain/rulesets/loader.js";
import { bounded, unbounded, type TaxSettings } from "./domain/rulesets/types.js";
import { renderAction, renderRates } from "./presentation/render.js";
import { ConversationService } from "./services/conversation-service.js";
import { createLogNotifier } from "./services/notification-service.js";
import { SettingsService } from "./services/settings-service.js";
import { CalculationError, ConfigurationError } from "./shared/errors.js";
import { createRequestId } from "./shared/ids.js";

export interface AppDependencies {
  settings: SettingsService;
  conversations: ConversationService;
  random?: RandomSource;
}

export function createDefaultDependencies(): AppDependencies {
  const settings = SettingsService.fromFile(env.SETTINGS_FILE);
  const conversations = new ConversationService({
    store: new SessionStore({
      idleTimeoutMs: env.SESSION_IDLE_TIMEOUT_MINUTES * 60 * 1000
    }),
    settings,
    notifier: createLogNotifier(env.TELLER_NAME),
    tellerName: env.TELLER_NAME,
    managerRoleId: env.MANAGER_ROLE_ID ?? null,
    includeDerivedSalary: env.CONVERSATION_INCLUDE_DERIVED_SALARY
  });

  return { settings, conversations };
}

function describeSettings(settings: TaxSettings) {
  const stored = toStoredSettings(settings);
  return {
    business: stored.tax_brackets,
    individual: stored.ceo_tax_brackets,
    derivedSalaryPercent: stored.ceo_salary_percent,
    rendered: renderRates(settings)
  };
}

function statusCodeOf(error: Error): number {
  if (error instanceof ZodError) {
    return 400;
  }

  if (error instanceof ConfigurationError || error instanceof CalculationError) {
    return 422;
  }

  return "statusCode" in error && typeof error.statusCode === "number" ? error.statusCode : 500;
}

function errorCodeOf(error: Error, statusCode: number): string {
  if (error instanceof ZodError) {
    return "VALIDATION_ERROR";
  }

  if (error instanceof ConfigurationError) {
    return "CONFIGURATION_INVALID";
  }

  if (error instanceof CalculationError) {
    return error.code;
  }

  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }

  return statusCode >= 500 ? "INTERNAL_ERROR" : "REQUEST_ERROR";
}

function errorDetailsOf(error: Error): unknown {
  if (error instanceof ZodError) {
    return error.issues;
  }

  if (error instanceof ConfigurationError) {
    return {
      reason: error.code,
      ...error.details
    };
  }

  return null;
}

export async function buildApp(dependencies: AppDependencies = createDefaultDependencies()) {
  const apiPrefix = "/v1";
  const { settings, conversations } = dependencies;
  const random = dependencies.random ?? defaultRandomSource;
  const app = Fastify({
    logger: env.NODE_ENV !== "test",
    disableRequestLogging: false,
    genReqId: () => createRequestId()
  });

  await app.register(sensible);
  await app.register(cors, {
    origin: env.CORS_ORIGINS.includes("*") ? true : env.CORS_ORIGINS,
    methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
    credentials: false
  });
  await app.register(fastifyRateLimit, {
    max: 200,
    timeWindow: "1 minute"
  });
  await app.register(fastifyJwt, {
    secret: env.JWT_ACCESS_SECRET
  });

  app.setErrorHandler(async (error: Error, request, reply) => {
    const statusCode = statusCodeOf(error);
    if (statusCode >= 500) {
      request.log.error({ err: error }, "request failed");
    }

    return reply.code(statusCode).send({
      code: errorCodeOf(error, statusCode),
      message: error.message,
      details: errorDetailsOf(error),
      requestId: request.id
    });
  });

  app.get("/health", async () => ({
    ok: true
  }));

  app.get("/openapi.json", async () => buildOpenApiDocument());

  app.get(`${apiPrefix}/health`, async () => ({
    ok: true,
    version: "v1"
  }));

  app.post(`${apiPrefix}/conversations`, { preHandler: requireAuth }, async (request) => {
    const body = beginConversationSchema.parse(request.body);
    const actor = getActor(request);
    const action = await conversations.begin(body.conversationId, actor.actorId, actor.isAdmin);
    if (action.type === "REFUSED") {
      throw app.httpErrors.forbidden(action.text);
    }

    return {
      conversationId: body.conversationId,
      action,
      rendered: renderAction(action, conversations.tellerName)
    };
  });

  app.post(`${apiPrefix}/conversations/:id/turns`, { preHandler: requireAuth }, async (request, reply) => {
    const { id } = conversationParamsSchema.parse(request.params);
    const body = turnSchema.parse(request.body);
    const actor = getActor(request);
    const action = await conversations.onTurn(id, actor.actorId, body.text, actor.isAdmin);

    if (!action) {
      return reply.code(404).send({
        code: "SESSION_NOT_FOUND",
        message: "No active session for this conversation.",
        details: null,
        requestId: request.id
      });
    }

    return {
      conversationId: id,
      action,
      rendered: renderAction(action, conversations.tellerName)
    };
  });

  app.delete(`${apiPrefix}/conversations/:id`, { preHandler: requireAuth }, async (request, reply) => {
    const { id } = conversationParamsSchema.parse(request.params);
    const actor = getActor(request);
    const outcome = await conversations.cancel(id, actor.actorId, actor.isAdmin);

    if (outcome === "NOT_FOUND") {
      throw app.httpErrors.notFound("No active session for this conversation.");
    }

    if (outcome === "REFUSED") {
      throw app.httpErrors.forbidden("Only the requester or an admin can cancel this session.");
    }

    return reply.code(204).send();
  });

  app.get(`${apiPrefix}/rates`, async () => describeSettings(settings.current()));

  app.post(`${apiPrefix}/calculations`, { preHandler: requireAuth }, async (request) => {
    const body = calculationSchema.parse(request.body);
    const context = new CalculationContext(random);

    for (const item of body.items) {
      const faces = typeof item.dice === "number" ? item.dice : parseDiceFaces(item.dice);
      if (faces === null) {
        throw new CalculationError("DICE_NOT_ALLOWED", `"${item.dice}" is not one of the allowed dice.`);
      }

      context.addItem(item.name, item.price, faces);
    }

    const result = context.computeReport({
      settings: settings.current(),
      expenses: body.expenses,
      includeDerivedSalary: body.includeCeoSalary,
      derivedSalaryPercent: body.salaryPercent
    });

    return {
      items: result.items.map((item) => ({
        ...item,
        revenue: lineItemRevenue(item)
      })),
      report: result.report
    };
  });

  app.put(
    `${apiPrefix}/admin/schedules/:kind/brackets`,
    { preHandler: [requireAuth, requireAdmin] },
    async (request) => {
      const { kind } = scheduleParamsSchema.parse(request.params);
      const body = bracketSchema.parse(request.body);
      const updated = await settings.upsertBracket(
        kind,
        {
          min: body.min,
          max: body.max === null ? unbounded : bounded(body.max),
          rate: body.rate
        },
        { actorId: getActor(request).actorId, requestId: request.id }
      );

      return describeSettings(updated);
    }
  );

  app.delete(
    `${apiPrefix}/admin/schedules/:kind/brackets/:min`,
    { preHandler: [requireAuth, requireAdmin] },
    async (request) => {
      const { kind, min } = removeBracketParamsSchema.parse(request.params);
      const updated = await settings.removeBracket(kind, min, {
        actorId: getActor(request).actorId,
        requestId: request.id
      });

      return describeSettings(updated);
    }
  );

  app.put(`${apiPrefix}/admin/derived-salary`, { preHandler: [requireAuth, requireAdmin] }, async (request) => {
    const body = derivedSalarySchema.parse(request.body);
    const updated = await settings.setDerivedSalaryPercent(body.percent, {
      actorId: getActor(request).actorId,
      requestId: request.id
    });

    return describeSettings(updated);
  });

  return app;
}
