// ABOUTME: Command line entry: parses options, takes over the terminal and runs the explorer
// ABOUTME: Fatal errors are reported as "mzoom: <message>" with exit status 1

import { Console } from "node:console";

import { ExplorerConfig, resolveConfig, USAGE } from "./config";
import { FractalExplorer } from "./explorer";
import { BandExecutor, createBandExecutor } from "./fractals/render";
import { openLogStream } from "./lib/log-file";
import { TerminalHost } from "./terminal/terminal-host";

async function explore(config: ExplorerConfig): Promise<void> {
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new Error("an interactive terminal is required (see --help)");
  }

  const host = new TerminalHost(process.stdin, process.stdout);
  const logFailures: Error[] = [];
  const logStream = await openLogStream(config.logFile, (error) => {
    logFailures.push(error);
    host.requestClose();
  });

  // The terminal UI owns stdout, so logs go to --log-file while it runs
  const terminalConsole = console;
  globalThis.console = new Console({ stdout: logStream, stderr: logStream });

  const requestClose = () => host.requestClose();
  let executor: BandExecutor | null = null;
  let explorer: FractalExplorer | null = null;

  try {
    executor = await createBandExecutor({ mode: config.mode, workerCount: config.workerCount });
    explorer = new FractalExplorer({
      host,
      surface: host,
      executor,
      size: host.size(),
      center: config.center,
      width: config.width,
      zoomFactor: config.zoomFactor,
      targetFps: config.targetFps,
      bandCount: config.bandCount,
    });

    process.once("SIGTERM", requestClose);
    process.once("SIGHUP", requestClose);
    host.open();
    await explorer.run();
  } finally {
    host.close();
    process.off("SIGTERM", requestClose);
    process.off("SIGHUP", requestClose);
    // Once built, the explorer owns the executor
    if (explorer) {
      await explorer.stop();
    } else {
      await executor?.terminate();
    }
    globalThis.console = terminalConsole;
    logStream.end();
  }

  const [logFailure] = logFailures;
  if (logFailure) {
    throw new Error(`writing log file ${config.logFile} failed: ${logFailure.message}`);
  }
}

async function main(argv: string[]): Promise<void> {
  const config = resolveConfig(argv);
  if (config.help) {
    process.stdout.write(USAGE);
    return;
  }
  await explore(config);
}

main(process.argv.slice(2)).catch((error: unknown) => {
  process.stderr.write(`mzoom: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
