import { parseArgs } from "node:util";
import { ConfigError, ControlRequestError } from "./board/errors";
import { reportMessage } from "./logic/reportMessage";
import { resetBoard, startBoard, stopBoard } from "./utils/boardControl";
import { subscribeBoardEvents } from "./utils/boardEvents";
import { loadConfig, resolveBoardHost, type BoardConfig } from "./utils/config";
import { derror, dinfo, dwarn, setDebug } from "./utils/logger";
import { boardEventsUrl } from "./utils/ws";

export const USAGE = `usage: board-events [watch|start|stop|reset] [options]

  watch              print throws and board events as they arrive (default)
  start              resume detection
  stop               pause detection
  reset              reset a stuck board

options:
  --host <name>            board host (BOARD_HOST, default localhost)
  --port <n>               board port (BOARD_PORT, default 3180)
  --reconnect-delay <ms>   delay before reconnecting (BOARD_RECONNECT_DELAY_MS, default 5000)
  --max-reconnects <n>     reconnect attempts after a drop (BOARD_MAX_RECONNECTS, default unlimited)
  --debug                  verbose logging (BOARD_DEBUG)`;

type ShutdownSignal = "SIGINT" | "SIGTERM";

export type CliDeps = {
  env?: Record<string, string | undefined>;
  // where SIGINT/SIGTERM come from; process in production
  signals?: { once(event: ShutdownSignal, listener: () => void): unknown };
  subscribe?: typeof subscribeBoardEvents;
};

async function watch(config: BoardConfig, deps: CliDeps) {
  const address = await resolveBoardHost(config);
  dinfo(`[Board] ${config.host} resolves to ${address}`);

  const subscribe = deps.subscribe ?? subscribeBoardEvents;
  const sub = subscribe(
    boardEventsUrl(config),
    {
      onMessage: (message) => {
        reportMessage(message);
      },
      onDecodeError: (err) => dwarn("[Board] dropped frame:", err.message),
      onOpen: () => console.log("### opened ###"),
      onError: (err) => derror("[Board] error:", err.message),
      onClose: (code) => console.log(`### closed (${code}) ###`),
    },
    config.reconnect,
  );
  sub.store.subscribe((s, prev) => {
    if (s.phase !== prev.phase) dinfo(`[Board] ${prev.phase} -> ${s.phase}`);
  });

  const stop = () => {
    dinfo("[Board] shutting down");
    sub.close();
  };
  const signals: NonNullable<CliDeps["signals"]> = deps.signals ?? process;
  signals.once("SIGINT", stop);
  signals.once("SIGTERM", stop);
}

async function run(argv: string[], deps: CliDeps): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      host: { type: "string" },
      port: { type: "string" },
      "reconnect-delay": { type: "string" },
      "max-reconnects": { type: "string" },
      debug: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });
  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(deps.env ?? process.env, {
    host: values.host,
    port: values.port,
    reconnectDelay: values["reconnect-delay"],
    maxReconnects: values["max-reconnects"],
    debug: values.debug,
  });
  setDebug(config.debug);

  const command = positionals[0] ?? "watch";
  switch (command) {
    case "watch":
      await watch(config, deps);
      return 0;
    case "start":
      await startBoard(config);
      return 0;
    case "stop":
      await stopBoard(config);
      return 0;
    case "reset":
      await resetBoard(config);
      return 0;
    default:
      console.error(`unknown command "${command}"\n\n${USAGE}`);
      return 1;
  }
}

/**
 * Runs one CLI invocation and returns the exit code. `watch` returns 0 once
 * subscribed; the open socket keeps the process alive until a shutdown signal.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  try {
    return await run(argv, deps);
  } catch (err) {
    if (err instanceof ConfigError || err instanceof ControlRequestError) {
      derror(`error: ${err.message}`);
    } else if (err instanceof TypeError && "code" in err) {
      // parseArgs rejects unknown or malformed flags this way
      derror(`error: ${err.message}\n\n${USAGE}`);
    } else {
      throw err;
    }
    return 1;
  }
}
