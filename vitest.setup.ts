/**
 * Vitest Global Setup
 *
 * Keeps configuration tests independent of the developer's shell.
 */
import { beforeEach } from "vitest";

const CONFIG_ENV_PREFIX = "QUILLWORK_";

function clearConfigEnv(): void {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith(CONFIG_ENV_PREFIX)) {
      delete process.env[key];
    }
  }
}

clearConfigEnv();

beforeEach(() => {
  clearConfigEnv();
});
