// backend/services/product/src/bootstrap.ts
/**
 * Side-effect module, imported first by index.ts:
 * load envs via the shared cascade (repo → family → service) and assert the
 * required variables before anything reads them.
 */

import path from "node:path";
import {
  assertRequiredEnv,
  loadEnvCascadeForService,
} from "@shared/config/env";
import { REQUIRED_ENV } from "./config";

loadEnvCascadeForService(path.resolve(__dirname, ".."));
assertRequiredEnv([...REQUIRED_ENV]);
