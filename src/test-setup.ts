/**
 * Test setup file for vitest
 *
 * Points the fleet home directory at a throwaway location so that log files
 * and default store paths never touch the real ~/.fleet
 */

import { mkdtempSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

if (!process.env.FLEET_HOME_DIR) {
  process.env.FLEET_HOME_DIR = mkdtempSync(join(tmpdir(), 'fleet-test-home-'))
}
