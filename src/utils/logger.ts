import * as winston from "winston";
import * as path from "node:path";
import * as fs from "node:fs";
import Transport from "winston-transport";
import axios from "axios";
import Config from "../core/config/index";

// `notify` carries security notifications (refresh token reuse, key rotation)
const customLogLevels = {
  levels: {
    error: 0,
    warn: 1,
    notify: 2,
    info: 3,
    http: 4,
    verbose: 5,
    debug: 6,
    silly: 7,
  },
  colors: {
    error: "red",
    warn: "yellow",
    notify: "blue",
    info: "green",
    http: "magenta",
    verbose: "cyan",
    debug: "white",
    silly: "grey",
  },
};

interface AuthLogger extends winston.Logger {
  notify: winston.LeveledLogMethod;
}

winston.addColors(customLogLevels.colors);

const LOG_FILES = ["error.log", "info.log", "combined.log"];

// Archive logs from the previous run when the service starts
function archiveOldLogs(logsDir: string) {
  const archiveDir = path.join(logsDir, "archive");
  fs.mkdirSync(archiveDir, { recursive: true });

  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");

  for (const logFile of LOG_FILES) {
    const logPath = path.join(logsDir, logFile);
    if (fs.existsSync(logPath)) {
      try {
        fs.copyFileSync(logPath, path.join(archiveDir, `${timestamp}_${logFile}`));
        fs.truncateSync(logPath, 0);
      } catch (err) {
        console.error(`Failed to archive ${logFile}:`, err);
      }
    }
  }
}

function convertJsToTsPath(jsPath: string): string {
  if (jsPath.endsWith(".ts")) {return jsPath;}
  let tsPath = jsPath.replace(/\.js$/, ".ts");
  if (tsPath.includes("/dist/")) {
    tsPath = tsPath.replace(/\/dist\//, "/src/");
  }
  return tsPath;
}

interface CallerInfo {
  file: string;
  line: number;
  function: string;
}

function getCallerInfo(): CallerInfo {
  const originalStackTraceLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = 20;
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, getCallerInfo);
  const stackLines = holder.stack?.split("\n").slice(1) || [];
  Error.stackTraceLimit = originalStackTraceLimit;

  for (const line of stackLines) {
    const match = line.match(/\(([^:]+):(\d+):\d+\)/) || line.match(/at\s+([^:]+):(\d+):\d+/);
    if (match) {
      const [, file, lineNumber] = match;
      if (
        file.includes("node_modules/") ||
        file.includes("internal/") ||
        file.includes("node:") ||
        file.includes("utils/logger")
      ) {
        continue;
      }
      const fnMatch = line.match(/at\s+([^(]+)\s+\(/);
      return {
        file: convertJsToTsPath(file),
        line: Number.parseInt(lineNumber, 10),
        function: fnMatch?.[1]?.trim() || "anonymous",
      };
    }
  }
  return { file: "unknown", line: 0, function: "anonymous" };
}

const fileAndLine = winston.format((info) => {
  const stackInfo = getCallerInfo();
  if (stackInfo.file !== "unknown") {
    const projectPath = stackInfo.file.replace(process.cwd(), "");
    const relativePath = projectPath.startsWith("/") ? projectPath.substring(1) : projectPath;
    info.logpath = `${relativePath}:${stackInfo.line}`;
    info.function = stackInfo.function;
  } else {
    info.logpath = "unknown:0";
    info.function = "anonymous";
  }
  return info;
});

interface AlertTransportOptions extends Transport.TransportStreamOptions {
  webhookUrl: string;
}

/**
 * Posts `error` and `notify` entries to an incoming-webhook endpoint.
 */
class AlertWebhookTransport extends Transport {
  private webhookUrl: string;

  constructor(opts: AlertTransportOptions) {
    super(opts);
    this.webhookUrl = opts.webhookUrl;
  }

  log(info: Record<string, unknown>, callback: () => void) {
    setImmediate(() => {
      this.emit("logged", info);
    });

    if (info.level === "error" || info.level === "notify") {
      void this.send(info);
    }

    callback();
  }

  private async send(info: Record<string, unknown>): Promise<void> {
    const title = info.level === "error"
      ? `ERROR: ${String(info.function ?? "Unknown Context")}`
      : `SECURITY NOTIFICATION: ${String(info.function ?? "General")}`;

    try {
      await axios.post(this.webhookUrl, {
        username: "token-auth-service",
        text: `${title}\n${String(info.message)}\nSource: ${String(info.logpath)}\nTime: ${String(info.timestamp)}`,
      });
    } catch (error) {
      // Logging through winston here would loop back into this transport
      console.error("Failed to send log alert:", error instanceof Error ? error.message : error);
    }
  }
}

const transportsList: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf((info) => `${String(info.timestamp)} [${String(info.logpath)}] ${info.level}: ${String(info.message)}`),
    ),
  }),
];

if (Config.LOG_DIR && !Config.SILENT) {
  const logsDir = path.resolve(Config.LOG_DIR);
  archiveOldLogs(logsDir);
  transportsList.push(
    new winston.transports.File({ filename: path.join(logsDir, "error.log"), level: "error" }),
    new winston.transports.File({ filename: path.join(logsDir, "info.log"), level: "info" }),
    new winston.transports.File({ filename: path.join(logsDir, "combined.log") }),
  );
}

if (Config.ALERT_WEBHOOK_URL && Config.ENABLE_ALERT_LOGGING) {
  transportsList.push(new AlertWebhookTransport({ webhookUrl: Config.ALERT_WEBHOOK_URL }));
}

export const logger = winston.createLogger({
  level: Config.LOG_LEVEL,
  levels: customLogLevels.levels,
  silent: Config.SILENT,
  format: winston.format.combine(
    fileAndLine(),
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: transportsList,
}) as AuthLogger;
