/**
 * Vitest Workspace Configuration
 *
 * Defines all testable packages in the monorepo.
 * Run `npm test` at the root to execute tests across all packages.
 */

import { defineWorkspace } from "vitest/config";

export default defineWorkspace(["packages/contracts", "packages/generator"]);
