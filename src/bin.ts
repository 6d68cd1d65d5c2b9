#!/usr/bin/env node
/**
 * Bin entry point for `report-authors`.
 *
 * Usage:
 *   report-authors ./reports --page-mode first_n --first-n 2
 *   node dist/src/bin.js report.pdf --debug
 *
 * @module bin
 */

import './index.js';
