#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   imaging-protocol-extractor      # after npm install -g
 *   node dist/bin.js                # direct invocation
 *
 * @module bin
 */

import './index.js';
