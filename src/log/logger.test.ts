import { describe, it, expect } from 'vitest';
import { logger_create, logLevel_parse, type Logger, type LoggerOptions } from './logger.js';

function recorder_make(options: LoggerOptions = {}): { logger: Logger; lines: string[] } {
    const lines: string[] = [];
    const logger: Logger = logger_create({ color: false, ...options, sink: (line: string): void => { lines.push(line); } });
    return { logger, lines };
}

describe('logger_create', (): void => {
    it('prefixes lines with scope and level', (): void => {
        const { logger, lines } = recorder_make({ level: 'debug' });
        logger.debug('parsed');
        logger.error('failed');
        expect(lines).toEqual(['[bake-graph] DEBUG parsed', '[bake-graph] ERROR failed']);
    });

    it('drops messages below the threshold', (): void => {
        const { logger, lines } = recorder_make({ level: 'warn' });
        logger.debug('a');
        logger.info('b');
        logger.warn('c');
        expect(lines).toEqual(['[bake-graph] WARN c']);
    });

    it('defaults to info', (): void => {
        const { logger, lines } = recorder_make();
        logger.debug('a');
        logger.info('b');
        expect(lines).toEqual(['[bake-graph] INFO b']);
    });

    it('emits nothing when silent', (): void => {
        const { logger, lines } = recorder_make({ level: 'silent' });
        logger.error('a');
        expect(lines).toEqual([]);
    });

    it('uses a custom scope', (): void => {
        const { logger, lines } = recorder_make({ scope: 'ci' });
        logger.info('ready');
        expect(lines).toEqual(['[ci] INFO ready']);
    });

    it('styles the line when colour is forced on', (): void => {
        const { logger, lines } = recorder_make({ color: true });
        logger.info('ready');
        expect(lines[0]).not.toBe('[bake-graph] INFO ready');
        expect(lines[0]).toContain('\u001b[');
    });
});

describe('logLevel_parse', (): void => {
    it('accepts known levels in any case', (): void => {
        expect(logLevel_parse('Info')).toBe('info');
        expect(logLevel_parse(' silent ')).toBe('silent');
    });

    it('rejects anything else', (): void => {
        expect(logLevel_parse('verbose')).toBeUndefined();
        expect(logLevel_parse(undefined)).toBeUndefined();
    });
});
