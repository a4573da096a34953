/**
 * Test setup shared by unit and integration tests. Runs before any test file
 * is imported, so src/config.ts is evaluated against this environment.
 *
 * process.env is cleared and reseeded so variables from the host (CI, a
 * developer's .env) cannot leak into the tests.
 */

const nodeEnvVars = {
  PATH: process.env.PATH,
  HOME: process.env.HOME,
  USER: process.env.USER,
  SHELL: process.env.SHELL,
  TERM: process.env.TERM,
  ...(process.env.NODE_DEBUG ? { NODE_DEBUG: process.env.NODE_DEBUG } : {}),
};

for (const key in process.env) {
  delete process.env[key];
}

Object.assign(process.env, nodeEnvVars);

process.env.NODE_ENV = "test";
process.env.SENTRY_DSN = "";
process.env.UC_CONFIG_HOME = "./config-test";
process.env.GOVEE_API_BASE = "https://govee.test";
