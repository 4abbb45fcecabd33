#!/usr/bin/env node
import { runPublishCommand } from './presentation/cli/publishCommand';

async function main(): Promise<void> {
    const exitCode = await runPublishCommand(process.argv.slice(2));
    process.exitCode = exitCode;
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
