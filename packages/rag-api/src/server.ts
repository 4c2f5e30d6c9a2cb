import "dotenv/config";
import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import { loadConfig } from "@lexsc/core/config";
import { createEmbedderFromEnv } from "@lexsc/core/embeddings/index";
import { createLogger } from "@lexsc/core/logger";
import { loadApiConfigFromEnv, type ApiConfig } from "./config";
import { createRagContext, type RagContext } from "./context";
import { OllamaChatClient } from "./llm/ollama";
import { registerRagRoutes } from "./routes/rag";

interface BuildServerDependencies {
  context: RagContext;
  config?: ApiConfig;
  logger?: boolean;
}

export async function buildServer(dependencies: BuildServerDependencies): Promise<FastifyInstance> {
  const config = dependencies.config ?? loadApiConfigFromEnv();
  const app = Fastify({
    logger: dependencies.logger ?? true,
    requestTimeout: config.requestTimeoutMs,
  });

  await app.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindow,
  });
  await app.register(cors, {
    origin: config.corsOrigins.includes("*") ? true : config.corsOrigins,
    methods: ["GET", "POST", "OPTIONS"],
    exposedHeaders: ["x-rag-kind", "x-rag-sources"],
  });

  await registerRagRoutes(app, { context: dependencies.context });

  app.get("/health", async () => ({
    status: "ok",
    indexReady: dependencies.context.index !== null && dependencies.context.documents !== null,
    documents: dependencies.context.documents?.size ?? 0,
  }));

  return app;
}

export interface RuntimeOptions {
  verbose?: boolean;
  logToStderr?: boolean;
}

export async function createRuntimeContext(apiConfig: ApiConfig, options: RuntimeOptions = {}): Promise<RagContext> {
  const config = loadConfig();
  const logger = createLogger(options.verbose ?? false, options.logToStderr ?? false);

  return createRagContext({
    config,
    logger,
    embedder: createEmbedderFromEnv(),
    llm: new OllamaChatClient({
      baseUrl: apiConfig.llmBaseUrl,
      model: apiConfig.llmModel,
      timeoutMs: apiConfig.llmTimeoutMs,
      temperature: apiConfig.llmTemperature,
    }),
    generationTemperature: apiConfig.llmTemperature,
  });
}

export async function startServer(options: { verbose?: boolean } = {}): Promise<void> {
  const config = loadApiConfigFromEnv();
  const context = await createRuntimeContext(config, { verbose: options.verbose ?? false });
  const app = await buildServer({ config, context });
  const address = await app.listen({
    port: config.port,
    host: config.host,
  });

  app.log.info({ address }, "rag api started");
}

if (require.main === module) {
  startServer().catch((error) => {
    const message = error instanceof Error ? error.stack ?? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
  });
}
