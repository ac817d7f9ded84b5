/**
 * Vitest Global Setup
 *
 * Resets the config cache before each test file and each test, so that
 * vi.stubEnv() calls made at file level or inside a test are picked up by
 * the config module on its next access.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
