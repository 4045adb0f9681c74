import * as winston from "winston";
import * as path from "node:path";
import * as fs from "node:fs";
import Transport from "winston-transport";
import axios from "axios";
import Config from "@/config/index";

// --- Custom levels: `notify` carries risk escalations ---
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

interface MonitorLogger extends winston.Logger {
  notify: winston.LeveledLogMethod;
}

interface LogInfo {
  level: string;
  message: unknown;
  timestamp?: string;
  logpath?: string;
  function?: string;
  [key: string]: unknown;
}

winston.addColors(customLogLevels.colors);

const logsDir = path.join(process.cwd(), "logs");
const archiveDir = path.join(logsDir, "archive");

// Move the previous run's logs aside when the process starts
function archiveOldLogs() {
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }
  if (!fs.existsSync(archiveDir)) {
    fs.mkdirSync(archiveDir, { recursive: true });
  }

  const logFiles = ["error.log", "info.log", "combined.log"];
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");

  for (const logFile of logFiles) {
    const logPath = path.join(logsDir, logFile);
    if (fs.existsSync(logPath)) {
      try {
        const archivePath = path.join(archiveDir, `${timestamp}_${logFile}`);
        fs.copyFileSync(logPath, archivePath);
        fs.truncateSync(logPath, 0);
      } catch (err) {
        console.error(`Failed to archive ${logFile}:`, err);
      }
    }
  }
}

function convertJsToTsPath(jsPath: string): string {
  const projectRoot = process.cwd();
  if (jsPath.endsWith(".ts")) {return jsPath;}
  let tsPath = jsPath.replace(/\.js$/, ".ts");
  if (tsPath.includes("/dist/")) {
    tsPath = tsPath.replace(/\/dist\//, "/");
  }
  if (tsPath.startsWith(projectRoot) && !tsPath.includes("/src/") && !tsPath.includes("/scripts/") && !tsPath.includes("node_modules")) {
    tsPath = path.join(projectRoot, "src", path.relative(projectRoot, tsPath));
  }
  return tsPath;
}

function getCallerInfo(): { file: string; line: number; function: string } {
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
        file.includes("/utils/logger") ||
        file.includes("_stream_transform.js")
      ) {
        continue;
      }
      return {
        file: convertJsToTsPath(file),
        line: Number.parseInt(lineNumber, 10),
        function: line.match(/at\s+([^(]+)\s+\(/)?.[1]?.trim() || "anonymous",
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
    info.file = path.basename(stackInfo.file);
    info.line = stackInfo.line;
    info.function = stackInfo.function;
  } else {
    info.logpath = "unknown:0";
    info.file = "unknown";
    info.line = 0;
    info.function = "anonymous";
  }
  return info;
});

interface AlertWebhookTransportOptions extends Transport.TransportStreamOptions {
  webhookUrl: string;
}

/**
 * Posts `error` and `notify` entries to a Discord-compatible webhook.
 */
export class AlertWebhookTransport extends Transport {
  private readonly webhookUrl: string;

  constructor(opts: AlertWebhookTransportOptions) {
    super(opts);
    this.webhookUrl = opts.webhookUrl;
  }

  log(info: LogInfo, callback: () => void) {
    setImmediate(() => {
      this.emit("logged", info);
    });

    if (info.level === "error" || info.level === "notify") {
      void this.postAlert(info);
    }

    callback();
  }

  buildPayload(info: LogInfo) {
    const isError = info.level === "error";
    return {
      username: "Cold Chain Monitor",
      embeds: [
        {
          title: isError
            ? `ERROR: ${info.function || "Unknown Context"}`
            : `RISK NOTIFICATION: ${info.function || "General"}`,
          description: String(info.message),
          color: isError ? 15158332 : 3447003,
          fields: [
            { name: "Source", value: info.logpath || "unknown:0", inline: true },
            { name: "Time", value: info.timestamp || new Date().toISOString(), inline: true },
          ],
          footer: { text: isError ? "System Alert" : "Spoilage Risk" },
        },
      ],
    };
  }

  private async postAlert(info: LogInfo): Promise<void> {
    try {
      await axios.post(this.webhookUrl, this.buildPayload(info));
    } catch (error) {
      // console, not the logger: an error entry here would post again
      console.error("Failed to send alert to webhook:", error instanceof Error ? error.message : error);
    }
  }
}

const transportsList: winston.transport[] = [];

if (Config.LOG_TO_FILE) {
  archiveOldLogs();
  transportsList.push(
    new winston.transports.File({ filename: path.join(logsDir, "error.log"), level: "error" }),
    new winston.transports.File({ filename: path.join(logsDir, "info.log"), level: "info" }),
    new winston.transports.File({ filename: path.join(logsDir, "combined.log") }),
  );
}

if (Config.ALERT_WEBHOOK_URL && Config.ENABLE_WEBHOOK_ALERTS) {
  transportsList.push(new AlertWebhookTransport({ webhookUrl: Config.ALERT_WEBHOOK_URL }));
}

transportsList.push(
  new winston.transports.Console({
    silent: Config.NODE_ENV === "test",
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf((info) => {
        const timestamp = new Date(String(info.timestamp)).getTime().toString();
        return `${timestamp} [${String(info.logpath)}] ${info.level}: ${String(info.message)}`;
      }),
    ),
  }),
);

export const logger = winston.createLogger({
  level: Config.LOG_LEVEL,
  levels: customLogLevels.levels,
  format: winston.format.combine(
    fileAndLine(),
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: transportsList,
}) as MonitorLogger;
