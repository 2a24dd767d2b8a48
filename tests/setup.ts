/**
 * Jest setup file - runs before each test file.
 * Keeps persisted state and temporary files out of the user's directories.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

process.env.NODE_ENV = "test";
process.env.CI = "false";
process.env.TZ = "UTC";

const root = fs.mkdtempSync(path.join(os.tmpdir(), "solstice-test-env-"));
process.env.XDG_DATA_HOME = path.join(root, "data");
process.env.XDG_CONFIG_HOME = path.join(root, "config");
delete process.env.SOLSTICE_CONFIG_HOME;
delete process.env.SOLSTICE_LOGGING_LEVEL;
