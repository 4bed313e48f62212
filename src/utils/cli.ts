/**
 * CLI Formatting Utility
 *
 * Boxed, coloured terminal output using chalk, boxen, figures and
 * log-symbols. figures and log-symbols fall back to ASCII on terminals
 * without Unicode.
 */

import chalk from 'chalk';
import boxen, { type Options as BoxenOptions } from 'boxen';
import figures from 'figures';
import logSymbols from 'log-symbols';

// ==================== SYMBOLS ====================

export const sym = {
    success: logSymbols.success,
    error: logSymbols.error,
    warning: logSymbols.warning,
    info: logSymbols.info,

    arrow: figures.arrowRight,
    pointer: figures.pointer,
    bullet: figures.bullet,

    drop: '💧',
    swap: '💱',
    money: '💰',
    clock: '⏰',
    chart: '📈',
    coin: '🪙',
    factory: '🏭',
};

// ==================== COLORS ====================

export const c = {
    primary: chalk.cyan,
    success: chalk.green,
    error: chalk.red,
    warning: chalk.yellow,
    info: chalk.blue,

    bold: chalk.bold,
    dim: chalk.dim,

    heading: chalk.bold.cyan,
    label: chalk.gray,
    value: chalk.white,
    highlight: chalk.bold.yellow,
};

// ==================== BOX STYLES ====================

const defaultBoxStyle: BoxenOptions = {
    padding: 1,
    borderStyle: 'round',
    borderColor: 'cyan',
};

export function box(content: string, title?: string, options?: BoxenOptions): string {
    return boxen(content, {
        ...defaultBoxStyle,
        title,
        titleAlignment: 'center',
        ...options,
    });
}

export function successBox(content: string, title?: string): string {
    return boxen(content, {
        ...defaultBoxStyle,
        borderColor: 'green',
        title: title || `${sym.success} Success`,
        titleAlignment: 'center',
    });
}

// ==================== MESSAGES ====================

export function success(msg: string): void {
    console.log(`${sym.success} ${c.success(msg)}`);
}

export function error(msg: string): void {
    console.error(`${sym.error} ${c.error(msg)}`);
}

export function warn(msg: string): void {
    console.log(`${sym.warning} ${c.warning(msg)}`);
}

export function info(msg: string): void {
    console.log(`${sym.info} ${c.info(msg)}`);
}

// ==================== KEY / VALUE ====================

/**
 * Aligned `label: value` lines for box bodies.
 */
export function rows(entries: Array<[string, string | number | bigint]>): string {
    const width = Math.max(...entries.map(([label]) => label.length)) + 1;
    return entries
        .map(([label, value]) => `${c.label((label + ':').padEnd(width + 1))}${c.value(String(value))}`)
        .join('\n');
}
