import { Chunk, Context, Effect, Layer, Stream } from "effect";
import { Command, CommandExecutor } from "@effect/platform";
import { ToolSpawnError } from "./errors.js";

export type ToolInvocation = {
  readonly command: string;
  readonly args: ReadonlyArray<string>;
  readonly cwd?: string;
  /** Called for every stdout and stderr line while the tool is still running. */
  readonly onOutput?: (line: string) => Effect.Effect<void>;
};

export type ToolResult = {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
};

export type ToolRunner = {
  readonly run: (invocation: ToolInvocation) => Effect.Effect<ToolResult, ToolSpawnError>;
};

export const ToolRunner = Context.GenericTag<ToolRunner>("@coverage-map/ToolRunner");

// Collects the output line by line, echoing each line as it arrives.
const collectLines = <E, R>(
  stream: Stream.Stream<Uint8Array, E, R>,
  onOutput: ToolInvocation["onOutput"],
): Effect.Effect<string, E, R> =>
  stream.pipe(
    Stream.decodeText(),
    Stream.splitLines,
    Stream.tap((line) => onOutput === undefined ? Effect.void : onOutput(line)),
    Stream.runCollect,
    Effect.map((lines) => Chunk.join(lines, "\n")),
  );

export const ToolRunnerLive = Layer.effect(
  ToolRunner,
  Effect.gen(function* () {
    const commandExecutor = yield* CommandExecutor.CommandExecutor;

    const run = (invocation: ToolInvocation) => Effect.gen(function* () {
      const base = Command.make(invocation.command, ...invocation.args);
      const command = invocation.cwd === undefined ? base : base.pipe(Command.workingDirectory(invocation.cwd));

      const process = yield* Command.start(command);
      const [exitCode, stdout, stderr] = yield* Effect.all(
        [
          process.exitCode,
          collectLines(process.stdout, invocation.onOutput),
          collectLines(process.stderr, invocation.onOutput),
        ],
        { concurrency: 3 }
      );
      return { exitCode, stdout, stderr };
    }).pipe(
      Effect.scoped,
      Effect.provide(Layer.succeed(CommandExecutor.CommandExecutor, commandExecutor)),
      Effect.withSpan("tool-runner.run", { attributes: { command: invocation.command } }),
      Effect.catchTags({
        BadArgument: (error) => Effect.fail(
          new ToolSpawnError({ command: invocation.command, message: `Execution failed: ${error.message}` })
        ),
        SystemError: (error) => Effect.fail(
          new ToolSpawnError({ command: invocation.command, message: `Execution failed: ${error.message}` })
        ),
      }),
    );

    return { run };
  })
);
