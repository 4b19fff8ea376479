#!/usr/bin/env node

/**
 * Hardware discovery agent - runs inside the booted installer environment.
 * Exit code 0 on success, 1 on any discovery failure.
 */

import { getDiscoveryConfig } from './config.js';
import { DiscoveryService } from './application/services/DiscoveryService.js';
import { errorMessage } from './core/errors.js';
import { DiscoveryReporter } from './infrastructure/http/DiscoveryReporter.js';
import { ExecCommandRunner } from './infrastructure/system/ExecCommandRunner.js';
import { NetworkBringUp } from './infrastructure/system/NetworkBringUp.js';
import { SysfsDeviceEnumerator } from './infrastructure/system/SysfsDeviceEnumerator.js';

async function main() {
  const config = getDiscoveryConfig();

  const debugLog = (message: string) => {
    if (config.debug) {
      console.error(`[DEBUG] ${message}`);
    }
  };

  const runner = new ExecCommandRunner(debugLog);
  const service = new DiscoveryService(
    new SysfsDeviceEnumerator(runner, config.sysRoot),
    new NetworkBringUp(runner),
    new DiscoveryReporter(config.callbackUrl, config.callbackTimeoutMs),
    {
      strategy: config.strategy,
      answerFilePath: config.answerFilePath,
      bootstrap: config.bootstrap,
    }
  );

  const outcome = await service.run();
  debugLog(`Discovery finished: ${JSON.stringify(outcome.hardware)}`);
}

main().catch((error) => {
  console.error(`ERROR: ${errorMessage(error)}`);
  process.exit(1);
});
