/**
 * Startup banner and formatted console helpers for the tweetshot CLI.
 */

import chalk from 'chalk';
import { config } from '../config/index.js';

/** Box inner width for the banner frame. */
const BOX_WIDTH = 42;

/** Center a string within the box width. */
function center(text: string): string {
    const left = Math.max(0, Math.floor((BOX_WIDTH - text.length) / 2));
    const right = Math.max(0, BOX_WIDTH - left - text.length);
    return ' '.repeat(left) + text + ' '.repeat(right);
}

/**
 * Print the tweetshot startup banner.
 * @param subtitle Optional second line (e.g. "Capture API")
 */
export function printBanner(subtitle?: string): void {
    if (config.logging.silent) return;
    const version = `v${config.version}`;
    const title = 'T W E E T S H O T';
    const bar = '─'.repeat(BOX_WIDTH);

    console.log('');
    console.log(chalk.cyan(`  ╭${bar}╮`));
    console.log(chalk.cyan('  │') + chalk.bold.white(center(title)) + chalk.cyan('│'));
    if (subtitle) {
        console.log(chalk.cyan('  │') + chalk.dim(center(subtitle)) + chalk.cyan('│'));
    }
    console.log(chalk.cyan('  │') + chalk.dim(center(version)) + chalk.cyan('│'));
    console.log(chalk.cyan(`  ╰${bar}╯`));
    console.log('');
}

/** Print a service status line (e.g. "  ✓ Storage       tweetcaptures @ localhost:9000"). */
export function printStatus(label: string, detail: string): void {
    if (config.logging.silent) return;
    console.log(`  ${chalk.green('✓')} ${chalk.bold(label.padEnd(14))}${chalk.dim(detail)}`);
}

/** Print a status line for a service that starts on demand. */
export function printPending(label: string, detail: string): void {
    if (config.logging.silent) return;
    console.log(`  ${chalk.yellow('○')} ${chalk.bold(label.padEnd(14))}${chalk.dim(detail)}`);
}

/** Print the final "ready" URL line. */
export function printReady(url: string): void {
    if (config.logging.silent) return;
    console.log('');
    console.log(`  ${chalk.green('→')} ${chalk.bold('Ready at')} ${chalk.cyan.underline(url)}`);
    console.log('');
}
