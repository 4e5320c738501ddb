#!/usr/bin/env node

// Copyright (c) 2026 dotandev
// SPDX-License-Identifier: MIT OR Apache-2.0

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import { registerRotateCommands } from './commands/rotate';

// Vault credentials and PKI settings may come from a local .env
dotenv.config();

const program = new Command();

program
    .name('certrotate')
    .description('Issue and rotate mTLS certificates from a Vault/OpenBao PKI backend')
    .version('0.1.0');

registerRotateCommands(program);

if (!process.argv.slice(2).length) {
    program.outputHelp();
} else {
    program.parseAsync(process.argv).catch((error: unknown) => {
        console.error(error);
        process.exit(1);
    });
}
