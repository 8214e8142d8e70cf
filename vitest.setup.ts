import fs from "node:fs";
import path from "node:path";

// Keep settings reads inside the workspace so tests never see a host-level
// ~/.webpuppet directory.
const testHome = path.resolve(process.cwd(), ".tmp", "webpuppet-test-home");
fs.mkdirSync(testHome, { recursive: true });
process.env.WEBPUPPET_HOME = testHome;
