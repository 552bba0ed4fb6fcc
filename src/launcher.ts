#!/usr/bin/env node
/**
 * rulekit launcher
 * Provisions the native binary, then runs it with this process's arguments and stdio.
 */

import { spawn } from 'child_process';
import { loadLauncherConfig } from './config/launcher-config';
import { handleError } from './errors';
import { BinaryProvisioner } from './provisioning/lifecycle';
import { debugLog } from './utils/logger';
import { wireChildProcessSignals } from './utils/signal-forwarder';
import { fail } from './utils/ui';

/** Exit code when the provisioned binary cannot be started */
export const EXIT_SPAWN_FAILED = 1;

/**
 * Start the binary with inherited stdio and mirror its exit
 */
export function runBinary(binaryPath: string, args: string[]): void {
  const child = spawn(binaryPath, args, {
    stdio: 'inherit',
    windowsHide: true,
  });

  wireChildProcessSignals(child, (err) => {
    console.error(fail(`Failed to start ${binaryPath}: ${err.message}`));
    process.exit(EXIT_SPAWN_FAILED);
  });
}

/**
 * Provision, then run. Provisioning failures propagate to the caller.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const config = loadLauncherConfig();
  const binaryPath = await new BinaryProvisioner(config).ensureBinary();
  debugLog(`Executing ${binaryPath} ${argv.join(' ')}`, config.verbose);
  runBinary(binaryPath, argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    process.exit(handleError(error));
  });
}
