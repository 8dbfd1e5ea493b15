/**
 * Voicemail Relay
 *
 * Polls Placetel for voicemails, transcribes, summarizes and emails them,
 * and serves the HTTP API and webhook.
 *
 * Run: npm start
 */

import "dotenv/config";
import { createServer } from "http";
import Anthropic from "@anthropic-ai/sdk";
import { log } from "./logger.ts";
import { isEmailConfigured, loadConfig, missingRequiredConfig } from "./config.ts";
import { PostgresVoicemailStore } from "./store-postgres.ts";
import { PlacetelGateway } from "./placetel.ts";
import { ElevenLabsTranscriber } from "./transcribe.ts";
import { LlmSummarizer, anthropicCompletion } from "./summarize.ts";
import { ResendNotifier } from "./email.ts";
import { Pipeline } from "./pipeline.ts";
import { PipelineScheduler } from "./scheduler.ts";
import { processVoicemailImmediate } from "./webhook.ts";
import { createHttpHandler } from "./http-routes.ts";

const logger = log.child("relay");

async function main(): Promise<void> {
  const config = loadConfig();

  const missing = missingRequiredConfig(config);
  if (missing.length > 0) {
    logger.warn("Missing configuration, affected stages will fail", { missing });
  }

  const store = new PostgresVoicemailStore(config.databaseUrl);
  await store.migrate();

  const emailRender = {
    publicBaseUrl: config.publicBaseUrl,
    publicAccessSecret: config.publicAccessSecret,
    timeZone: config.email.timeZone,
  };

  const notifier = isEmailConfigured(config)
    ? new ResendNotifier({
        ...emailRender,
        apiKey: config.email.resendApiKey,
        from: config.email.from,
        fromName: config.email.fromName,
        attachAudio: config.email.attachAudio,
      })
    : null;
  if (!notifier) logger.info("Email sender not configured, notifications disabled");

  const pipeline = new Pipeline({
    store,
    gateway: new PlacetelGateway(config.placetel),
    transcriber: new ElevenLabsTranscriber(config.elevenlabs),
    summarizer: new LlmSummarizer(
      anthropicCompletion(new Anthropic({ apiKey: config.anthropic.apiKey }), config.anthropic.model),
      config.anthropic.model,
    ),
    notifier,
  });

  const scheduler = new PipelineScheduler(() => pipeline.runAll());
  scheduler.start(await pipeline.settings.getSyncIntervalMinutes());

  const httpServer = createServer(createHttpHandler({
    store,
    pipeline,
    scheduler,
    emailRender,
    webhookSecret: config.placetel.webhookSecret,
    dispatchVoicemail: (callId) => {
      processVoicemailImmediate(pipeline, callId).catch(err =>
        logger.error("Immediate processing failed", { external_id: callId }, err),
      );
    },
  }));

  httpServer.listen(config.httpPort, () => {
    logger.info("HTTP server listening", { port: config.httpPort, webhook: `${config.publicBaseUrl}/webhook/placetel` });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { signal });
    scheduler.stop();
    await new Promise<void>(resolve => httpServer.close(() => resolve()));
    await store.close();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch(err => {
        logger.fatal("Shutdown failed", err);
        process.exit(1);
      });
    });
  }
}

main().catch(err => {
  logger.fatal("Relay failed to start", err);
  process.exit(1);
});
