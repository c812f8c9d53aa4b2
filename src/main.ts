#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { ConfigProvider, Effect, Logger, LogLevel, Option } from "effect"
import * as Sentry from "@sentry/node";
import { configProviderFromFile, resolveSiteConfig } from "./config.js";
import { CoverageMapGenerator, type CoverageMapError } from "./coverage-map.js";
import type { SiteConfigError } from "./errors/site-config.error.js";
import { createRasterConverterLayer } from "./layers.js";

const sentryDsn = process.env.SENTRY_DSN;

if (sentryDsn) {
  Sentry.init({ dsn: sentryDsn });
}

const configFileArgument = (argv: ReadonlyArray<string>): Option.Option<string> => {
  const index = argv.indexOf('--config');
  return index === -1 ? Option.none() : Option.fromNullable(argv[index + 1]);
};

const reportFailure = (error: SiteConfigError | CoverageMapError) => Effect.gen(function*() {
  yield* Effect.logError(`[${error.stage}] ${error._tag}: ${error.message}`);

  if (sentryDsn) {
    Sentry.captureException(error, { tags: { stage: error.stage, error: error._tag } });
    yield* Effect.promise(() => Sentry.flush(2000));
  }
});

const program = Effect.gen(function*() {
  const provider = yield* Option.match(configFileArgument(process.argv), {
    onNone: () => Effect.succeed(ConfigProvider.fromEnv()),
    onSome: configProviderFromFile,
  });

  const { parameters, profile } = yield* resolveSiteConfig.pipe(Effect.withConfigProvider(provider));

  const generator = new CoverageMapGenerator();

  yield* generator.generate(parameters, profile).pipe(
    Effect.provide(createRasterConverterLayer(parameters.paths)),
    Logger.withMinimumLogLevel(parameters.output.debug ? LogLevel.Debug : LogLevel.Info),
  );
}).pipe(
  Effect.tapError(reportFailure),
  Effect.provide(NodeContext.layer),
);

NodeRuntime.runMain(program, { disableErrorReporting: true });
