import { config as loadEnv } from "dotenv";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export type DuplicatePolicy = "first" | "last" | "error";

export type OverviewConfig = {
  port: number;
  host: string;
  isDev: boolean;
  logLevel: string;
  prettyLogs: boolean;
  duplicatePolicy: DuplicatePolicy;
};

const DEFAULT_PORT = 3333;

export function normalizeDuplicatePolicy(value?: string): DuplicatePolicy {
  const raw = (value ?? "").trim().toLowerCase();
  if (raw === "last" || raw === "error" || raw === "first") return raw;
  return "first";
}

function parsePort(value?: string): number {
  const port = Number(value);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_PORT;
}

export function loadOverviewConfig(env: NodeJS.ProcessEnv = process.env): OverviewConfig {
  const isDev = env.NODE_ENV !== "production";
  return {
    port: parsePort(env.PORT),
    host: env.HOST || "0.0.0.0",
    isDev,
    logLevel: env.LOG_LEVEL ?? (isDev ? "debug" : "info"),
    prettyLogs: env.PINO_PRETTY === "1",
    duplicatePolicy: normalizeDuplicatePolicy(env.OVERVIEW_DUPLICATE_POLICY),
  };
}
