#!/usr/bin/env node
/**
 * rulekit-install
 * Provisions the binary without running it and prints its path (CI image warm-up).
 */

import { loadLauncherConfig } from './config/launcher-config';
import { handleError } from './errors';
import { BinaryProvisioner } from './provisioning/lifecycle';
import { color, info, ok } from './utils/ui';

export async function install(): Promise<number> {
  try {
    const config = loadLauncherConfig();
    const provisioner = new BinaryProvisioner(config);
    const binaryPath = await provisioner.ensureBinary();

    if (!config.quiet) {
      const location = color(binaryPath, 'path');
      console.error(
        provisioner.getState() === 'valid-cache-hit'
          ? info(`${config.binaryName} v${config.version} already installed: ${location}`)
          : ok(`${config.binaryName} v${config.version} installed: ${location}`)
      );
    }
    // Bare path on stdout for scripts
    console.log(binaryPath);
    return 0;
  } catch (error) {
    return handleError(error);
  }
}

if (require.main === module) {
  install().then(
    (code) => process.exit(code),
    (error: unknown) => process.exit(handleError(error))
  );
}
