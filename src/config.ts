import dotenv from "dotenv";
import path from "node:path";

dotenv.config();

const raise = (message: string): never => {
  throw new Error(message);
};

const intEnvironment = (value: string, fallback?: number): number => {
  const parsed = Number.parseInt(process.env[value] || "", 10);
  if (Number.isFinite(parsed)) {
    return parsed;
  }
  return fallback ?? raise(`Missing or invalid environment variable: ${value}`);
};

const stringEnvironment = (value: string, fallback?: string): string => {
  return (
    process.env[value] ??
    fallback ??
    raise(`Missing required environment variable: ${value}`)
  );
};

const positive = (value: number, name: string): number =>
  value > 0 ? value : raise(`${name} must be a positive integer`);

const configHome = stringEnvironment("UC_CONFIG_HOME", "./config");

export default {
  env: (process.env.NODE_ENV || "production").toLowerCase(),
  sentryDsn: stringEnvironment("SENTRY_DSN", ""),
  httpPort: intEnvironment("HTTP_PORT", 9090),
  configHome,
  configFile: path.join(configHome, "config.json"),
  goveeApiBase: stringEnvironment(
    "GOVEE_API_BASE",
    "https://openapi.api.govee.com"
  ),
  // token bucket for outgoing API requests: rateLimit per ratePeriod seconds
  rateLimit: positive(intEnvironment("GOVEE_RATE_LIMIT", 10), "GOVEE_RATE_LIMIT"),
  ratePeriod: positive(
    intEnvironment("GOVEE_RATE_PERIOD", 60),
    "GOVEE_RATE_PERIOD"
  ),
  requestTimeout: intEnvironment("GOVEE_REQUEST_TIMEOUT", 30_000),
};
