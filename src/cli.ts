#!/usr/bin/env node

import { Command } from "commander";
import type { FastifyInstance } from "fastify";
import { completeMicrosoftLogin } from "./auth/callback.js";
import { MicrosoftAuth, recordState } from "./auth/microsoft.js";
import { TokenStore } from "./auth/token-store.js";
import { MicrosoftGraphClient } from "./clients/microsoft-graph.js";
import { loadConfig, oauthRedirectUri, webhookUrl, type AppConfig } from "./config.js";
import { DbClient } from "./db.js";
import { describeFailure } from "./errors.js";
import { IntegrationState } from "./integration-state.js";
import { InProcessJobQueue } from "./jobs/queue.js";
import { createLogger, type Logger } from "./logger.js";
import { MeetingService } from "./meetings/service.js";
import { validateMeetingTime } from "./meetings/times.js";
import { importRecordsFromFile } from "./records/import.js";
import { requireRecordKind } from "./records/kinds.js";
import { SqliteRecordStore } from "./records/store.js";
import { RsvpReconciler, type RsvpJob } from "./rsvp/reconciler.js";
import { buildServer } from "./server/app.js";
import { SubscriptionManager } from "./subscription/manager.js";
import { RenewalLoop } from "./subscription/renewal-loop.js";
import type { RecordKey } from "./types.js";

interface Runtime {
  config: AppConfig;
  db: DbClient;
  logger: Logger;
  auth: MicrosoftAuth;
  graph: MicrosoftGraphClient;
  records: SqliteRecordStore;
  state: IntegrationState;
  meetings: MeetingService;
  subscriptions: SubscriptionManager;
}

async function withRuntime<T>(fn: (runtime: Runtime) => Promise<T>): Promise<T> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const db = new DbClient(config.sqlitePath);
  const tokenStore = new TokenStore(db, config.tokenEncryptionKey, logger);

  const auth = new MicrosoftAuth(
    {
      clientId: config.microsoftClientId,
      clientSecret: config.microsoftClientSecret,
      tenantId: config.microsoftTenantId,
      redirectUri: oauthRedirectUri(config),
    },
    tokenStore,
    logger,
  );
  const graph = new MicrosoftGraphClient(() => auth.requireAccessToken(), logger);
  const records = new SqliteRecordStore(db, config.localTimeZone);
  const state = new IntegrationState(db, config.deploymentId);

  const meetings = new MeetingService({
    auth,
    graph,
    records,
    db,
    logger,
    timeZone: config.localTimeZone,
  });
  const subscriptions = new SubscriptionManager(
    { tokens: auth, graph, state, logger },
    { notificationUrl: webhookUrl(config), clientState: config.webhookClientState },
  );

  try {
    return await fn({ config, db, logger, auth, graph, records, state, meetings, subscriptions });
  } finally {
    db.close();
  }
}

function toRecordKey(kind: string, name: string): RecordKey {
  return { kind: requireRecordKind(kind), name };
}

function print(value: unknown) {
  console.log(JSON.stringify(value, null, 2));
}

async function serve(runtime: Runtime) {
  const { config, logger, subscriptions } = runtime;

  const reconciler = new RsvpReconciler({
    tokens: runtime.auth,
    graph: runtime.graph,
    records: runtime.records,
    logger,
  });
  const rsvpQueue = new InProcessJobQueue<RsvpJob>(
    "rsvp",
    (job) => reconciler.reconcile(job.resource),
    logger,
  );

  const app: FastifyInstance = await buildServer({
    webhookPath: config.webhookPath,
    oauthRedirectPath: config.oauthRedirectPath,
    webhookClientState: config.webhookClientState,
    rsvpQueue,
    completeLogin: (params) =>
      completeMicrosoftLogin(params, {
        auth: runtime.auth,
        graph: runtime.graph,
        db: runtime.db,
        state: runtime.state,
        logger,
      }),
    logger,
  });

  await app.listen({ host: config.httpHost, port: config.httpPort });
  logger.info(
    { host: config.httpHost, port: config.httpPort, webhookUrl: webhookUrl(config) },
    "Meeting bridge listening",
  );

  const renewals = new RenewalLoop(
    subscriptions,
    config.subscriptionRenewalIntervalHours * 60 * 60 * 1000,
    logger,
  );
  await renewals.start();

  await new Promise<void>((resolve) => {
    let shuttingDown = false;
    const onSignal = () => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      logger.info("Shutdown signal received");

      app
        .close()
        .then(() => renewals.stop())
        .then(() => rsvpQueue.drain())
        .catch((error: unknown) => {
          logger.error({ err: error }, "Error during shutdown");
        })
        .finally(() => {
          process.off("SIGINT", onSignal);
          process.off("SIGTERM", onSignal);
          resolve();
        });
    };

    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

const program = new Command();
program
  .name("meeting-bridge")
  .description("Teams meetings for local records, with RSVP sync from Microsoft Graph")
  .version("0.1.0");

program
  .command("serve")
  .description("Run the webhook and OAuth endpoints and keep the Graph subscription alive")
  .action(async () => {
    await withRuntime(serve);
  });

program
  .command("auth:url")
  .description("Print the Microsoft sign-in URL")
  .option("-k, --kind <kind>", "record kind to return to after sign-in")
  .option("-n, --name <name>", "record name to return to after sign-in")
  .action(async (options: { kind?: string; name?: string }) => {
    await withRuntime(async ({ auth }) => {
      const state =
        options.kind && options.name ? recordState(toRecordKey(options.kind, options.name)) : undefined;
      console.log(auth.getAuthorizationUrl(state));
    });
  });

program
  .command("auth:status")
  .description("Check whether the stored Microsoft token works")
  .action(async () => {
    await withRuntime(async ({ auth }) => {
      print(await auth.getAuthenticationStatus());
    });
  });

program
  .command("auth:revoke")
  .description("Forget the stored Microsoft token")
  .action(async () => {
    await withRuntime(async ({ auth }) => {
      const removed = auth.revoke();
      print({ success: true, removed });
    });
  });

program
  .command("subscription:create")
  .description("Register a new Graph change subscription for calendar events")
  .action(async () => {
    await withRuntime(async ({ subscriptions }) => {
      print(await subscriptions.createSubscription());
    });
  });

program
  .command("subscription:ensure")
  .description("Renew the stored Graph subscription, or create one")
  .action(async () => {
    await withRuntime(async ({ subscriptions }) => {
      const outcome = await subscriptions.ensureSubscription();
      print(outcome);
      if (outcome.status === "failed") {
        process.exitCode = 1;
      }
    });
  });

program
  .command("record:import")
  .description("Create or update local records from a JSON file")
  .argument("<file>", "JSON file holding one record or a list of records")
  .option("-a, --actor <user>", "user performing the import (checked against record owners)")
  .action(async (file: string, options: { actor?: string }) => {
    await withRuntime(async ({ records }) => {
      print(importRecordsFromFile(file, records, { actor: options.actor }));
    });
  });

program
  .command("meeting:create")
  .description("Create the Teams meeting for a record, or add new participants to it")
  .argument("<kind>")
  .argument("<name>")
  .action(async (kind: string, name: string) => {
    await withRuntime(async ({ meetings }) => {
      print(await meetings.createMeeting(toRecordKey(kind, name)));
    });
  });

program
  .command("meeting:details")
  .description("Show the remote meeting behind a record")
  .argument("<kind>")
  .argument("<name>")
  .action(async (kind: string, name: string) => {
    await withRuntime(async ({ meetings }) => {
      print(await meetings.getMeetingDetails(toRecordKey(kind, name)));
    });
  });

program
  .command("meeting:attendees")
  .description("List the attendees of a record's meeting")
  .argument("<kind>")
  .argument("<name>")
  .action(async (kind: string, name: string) => {
    await withRuntime(async ({ meetings }) => {
      print(await meetings.getMeetingAttendees(toRecordKey(kind, name)));
    });
  });

program
  .command("meeting:reschedule")
  .description("Move a record's meeting; defaults to the record's own start and end")
  .argument("<kind>")
  .argument("<name>")
  .option("-s, --start <datetime>", "new start (local time)")
  .option("-e, --end <datetime>", "new end (local time)")
  .action(async (kind: string, name: string, options: { start?: string; end?: string }) => {
    await withRuntime(async ({ meetings }) => {
      print(await meetings.rescheduleMeeting(toRecordKey(kind, name), options.start, options.end));
    });
  });

program
  .command("meeting:delete")
  .description("Delete a record's meeting and clear its link")
  .argument("<kind>")
  .argument("<name>")
  .action(async (kind: string, name: string) => {
    await withRuntime(async ({ meetings }) => {
      const result = await meetings.deleteMeeting(toRecordKey(kind, name));
      print(result);
      if (!result.success) {
        process.exitCode = 1;
      }
    });
  });

program
  .command("meeting:validate")
  .description("Check a proposed meeting window")
  .argument("<start>")
  .argument("<end>")
  .action(async (start: string, end: string) => {
    const config = loadConfig();
    const result = validateMeetingTime(start, end, config.localTimeZone);
    print(result);
    if (!result.valid) {
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  const failure = describeFailure(error);
  console.error(failure.message);
  if (failure.loginUrl) {
    console.error(`Sign in at: ${failure.loginUrl}`);
  }
  if (failure.kind !== "auth_required" && error instanceof Error) {
    console.error(error.message);
  }
  process.exitCode = 1;
});
