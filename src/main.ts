#!/usr/bin/env node
/**
 * Command-Line Entry Point
 * 
 * Runs the play-by-play pipeline for the game ids given as arguments
 * (or GAME_IDS) and exits non-zero when any game failed.
 */

import { logger } from './core/logger.js';
import { startApp } from './services/app.js';

startApp(process.argv.slice(2))
  .then(results => {
    process.exitCode = results.some(r => r.status !== 'ok') ? 1 : 0;
  })
  .catch((err) => {
    logger.error({ err }, 'Fatal error occurred');
    process.exit(1);
  });
