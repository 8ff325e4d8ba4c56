/**
 * Vitest Global Setup
 *
 * Resets the config cache before each test so vi.stubEnv() values are
 * picked up by the next getConfig() call.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
