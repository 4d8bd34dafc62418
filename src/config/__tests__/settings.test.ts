/**
 * Tests for settings loading and validation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
    DEFAULT_SETTINGS,
    SETTINGS_FILENAME,
    SettingsError,
    applySettings,
    getSettingsPath,
    loadSettings,
    parseSettingsText,
    resolveSettings,
} from '../settings';
import { createSessionFromSettings } from '../../parser/inlineSession';
import { parseInline } from '../../parser/inlineParser';
import { LogLevel, getLoggingService, type LogSink } from '../../utils/logger';

describe('Settings', () => {
    let tempDir: string;
    let previousSink: LogSink;
    let lines: string[];

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'org-inline-settings-'));
        lines = [];
        previousSink = getLoggingService().setSink((_level, line) => {
            lines.push(line);
        });
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
        getLoggingService().setSink(previousSink);
        getLoggingService().setLevel(LogLevel.WARN);
    });

    function writeSettings(content: string): string {
        const settingsPath = path.join(tempDir, SETTINGS_FILENAME);
        fs.writeFileSync(settingsPath, content, 'utf-8');
        return settingsPath;
    }

    // =============================================================================
    // Loading
    // =============================================================================

    describe('loadSettings', () => {
        it('should return defaults when the file is missing', () => {
            expect(loadSettings(path.join(tempDir, 'missing.json'), {})).toEqual(DEFAULT_SETTINGS);
        });

        it('should read values and skip line comments', () => {
            const settingsPath = writeSettings(
                '// org-inline settings\n' +
                JSON.stringify({
                    'inline.logLevel': 'Debug',
                    'inline.anonymousFootnotePrefix': 'fn-',
                    'inline.entities': { tick: { latex: '\\checkmark', html: '&#10003;', utf8: '✓' } },
                }, null, 2)
            );

            expect(loadSettings(settingsPath, {})).toEqual({
                logLevel: 'debug',
                anonymousFootnotePrefix: 'fn-',
                entities: { tick: { latex: '\\checkmark', html: '&#10003;', utf8: '✓' } },
            });
        });

        it('should skip block comments', () => {
            const settingsPath = writeSettings('{ /* quiet */ "inline.logLevel": "error" }');
            expect(loadSettings(settingsPath, {}).logLevel).toBe('error');
        });

        it('should reject malformed JSON', () => {
            const settingsPath = writeSettings('{ "inline.logLevel": ');
            expect(() => loadSettings(settingsPath, {})).toThrow(SettingsError);
        });

        it('should build the default path from a directory', () => {
            expect(getSettingsPath(tempDir)).toBe(path.join(tempDir, '.org-inline.json'));
        });
    });

    // =============================================================================
    // Validation
    // =============================================================================

    describe('validation', () => {
        it('should reject a non-object document', () => {
            expect(() => parseSettingsText('[1, 2]', 'test.json')).toThrow(
                'Invalid settings in test.json: expected a JSON object'
            );
        });

        it('should reject an unknown log level', () => {
            expect(() => resolveSettings({ 'inline.logLevel': 'loud' }, 'test.json', {})).toThrow(
                "Invalid settings in test.json: unknown log level 'loud'"
            );
        });

        it('should reject a prefix that would break footnote syntax', () => {
            expect(() => resolveSettings({ 'inline.anonymousFootnotePrefix': 'a:b' }, 'test.json', {}))
                .toThrow(SettingsError);
            expect(() => resolveSettings({ 'inline.anonymousFootnotePrefix': '' }, 'test.json', {}))
                .toThrow(SettingsError);
        });

        it('should reject entity names that are not letters', () => {
            expect(() => resolveSettings(
                { 'inline.entities': { x1: { latex: 'x', html: 'x', utf8: 'x' } } },
                'test.json',
                {}
            )).toThrow("Invalid settings in test.json: entity name 'x1' must consist of letters");
        });

        it('should reject entities with missing fields', () => {
            expect(() => resolveSettings(
                { 'inline.entities': { tick: { latex: 'x' } } },
                'test.json',
                {}
            )).toThrow(SettingsError);
        });
    });

    // =============================================================================
    // Environment and Application
    // =============================================================================

    describe('environment', () => {
        it('should let the environment override the log level', () => {
            const settings = resolveSettings({ 'inline.logLevel': 'info' }, 'test.json', { ORG_INLINE_LOG_LEVEL: 'ERROR' });
            expect(settings.logLevel).toBe('error');
        });

        it('should warn about and ignore an unknown environment level', () => {
            const settings = resolveSettings({}, 'test.json', { ORG_INLINE_LOG_LEVEL: 'chatty' });
            expect(settings.logLevel).toBe('warn');
            expect(lines).toHaveLength(1);
            expect(lines[0]).toContain('[Settings] Ignoring unknown ORG_INLINE_LOG_LEVEL value {"value":"chatty"}');
        });
    });

    describe('applying settings', () => {
        it('should set the logging level', () => {
            applySettings({ ...DEFAULT_SETTINGS, logLevel: 'debug' });
            expect(getLoggingService().getConfiguredLevel()).toBe(LogLevel.DEBUG);
        });

        it('should configure a parse session', () => {
            const session = createSessionFromSettings({
                logLevel: 'warn',
                anonymousFootnotePrefix: 'fn-',
                entities: { tick: { latex: '\\checkmark', html: '&#10003;', utf8: '✓' } },
            });
            const nodes = parseInline('\\tick[fn::x]', session);
            expect(nodes.map(n => n.type)).toEqual(['entity', 'footnote-reference']);
            expect(nodes[1].type === 'footnote-reference' && nodes[1].properties.name).toBe('fn-1');
        });
    });
});
