#!/usr/bin/env node
// SPDX-FileCopyrightText: 2024 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/**
 * Terminal front end for a single ordering session
 */

import { createInterface } from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { loadConfig } from './config.js';
import { Staff } from './entities/Staff.js';
import { OrderSession, SessionReply } from './orderSession.js';
import { loadMenuCatalog } from './services/menuCatalog.js';
import * as logger from './utils/logger.js';

function print(reply: SessionReply): void {
  for (const message of reply.messages) {
    output.write(`${message}\n`);
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLogLevel(config.logLevel);

  const catalog = await loadMenuCatalog(config.menuDataPath);
  const session = new OrderSession({
    catalog,
    staff: new Staff(1, config.staffName),
    format: { cafeName: config.cafeName, currencySymbol: config.currencySymbol }
  });

  const rl = createInterface({ input, output });
  try {
    let reply = session.start();
    while (!reply.done) {
      print(reply);
      const answer = await rl.question(reply.prompt);
      reply = session.handleInput(answer);
    }
    print(reply);
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  logger.fatal('Ordering session failed', { context: 'cli', error });
  process.exitCode = 1;
});
