/**
 * Settings - read org-inline settings from a JSON settings file
 *
 * Keys use the same dotted form as editor settings ("inline.logLevel").
 * Missing keys fall back to defaults; the ORG_INLINE_LOG_LEVEL environment
 * variable overrides the configured log level.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { EntityDefinition } from '../parser/orgEntities';
import {
    getLoggingService,
    parseLogLevel,
    settingsLogger,
    type LogLevelName,
} from '../utils/logger';

export const SETTINGS_FILENAME = '.org-inline.json';

export const LOG_LEVEL_ENV = 'ORG_INLINE_LOG_LEVEL';

/**
 * All org-inline settings
 */
export interface InlineSettings {
    /** Minimum level written by the logger */
    logLevel: LogLevelName;
    /** Prefix of generated names for [fn::...] references */
    anonymousFootnotePrefix: string;
    /** Extra entities, merged over the built-in table */
    entities: Record<string, EntityDefinition>;
}

export const DEFAULT_SETTINGS: Readonly<InlineSettings> = {
    logLevel: 'warn',
    anonymousFootnotePrefix: '_anon_',
    entities: {},
};

/**
 * Error thrown when a settings file cannot be read or holds invalid values
 */
export class SettingsError extends Error {
    public readonly settingsPath: string;

    constructor(settingsPath: string, message: string) {
        super(`Invalid settings in ${settingsPath}: ${message}`);
        this.name = 'SettingsError';
        this.settingsPath = settingsPath;
    }
}

/**
 * Get the default settings path for a working directory
 */
export function getSettingsPath(cwd: string = process.cwd()): string {
    return path.join(cwd, SETTINGS_FILENAME);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse settings JSON, tolerating comments
 */
export function parseSettingsText(content: string, settingsPath: string): Record<string, unknown> {
    // Remove single-line and multi-line comments
    const jsonContent = content
        .replace(/^\s*\/\/.*$/gm, '')
        .replace(/\/\*[\s\S]*?\*\//g, '');

    let parsed: unknown;
    try {
        parsed = JSON.parse(jsonContent);
    } catch (err) {
        throw new SettingsError(settingsPath, err instanceof Error ? err.message : String(err));
    }

    if (!isRecord(parsed)) {
        throw new SettingsError(settingsPath, 'expected a JSON object');
    }
    return parsed;
}

function isLogLevelName(value: string): value is LogLevelName {
    return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function getLogLevel(settings: Record<string, unknown>, settingsPath: string): LogLevelName {
    const value = settings['inline.logLevel'];
    if (value === undefined) {
        return DEFAULT_SETTINGS.logLevel;
    }
    if (typeof value !== 'string') {
        throw new SettingsError(settingsPath, 'inline.logLevel must be a string');
    }
    const normalized = value.trim().toLowerCase();
    if (!isLogLevelName(normalized)) {
        throw new SettingsError(settingsPath, `unknown log level '${value}'`);
    }
    return normalized;
}

function getPrefix(settings: Record<string, unknown>, settingsPath: string): string {
    const value = settings['inline.anonymousFootnotePrefix'];
    if (value === undefined) {
        return DEFAULT_SETTINGS.anonymousFootnotePrefix;
    }
    if (typeof value !== 'string' || value.length === 0 || /[\]:\s]/.test(value)) {
        throw new SettingsError(
            settingsPath,
            'inline.anonymousFootnotePrefix must be a non-empty string without whitespace, ":" or "]"'
        );
    }
    return value;
}

function getEntities(settings: Record<string, unknown>, settingsPath: string): Record<string, EntityDefinition> {
    const value = settings['inline.entities'];
    if (value === undefined) {
        return {};
    }
    if (!isRecord(value)) {
        throw new SettingsError(settingsPath, 'inline.entities must be an object');
    }

    const entities: Record<string, EntityDefinition> = {};
    for (const [name, definition] of Object.entries(value)) {
        if (!/^[a-zA-Z]+$/.test(name)) {
            throw new SettingsError(settingsPath, `entity name '${name}' must consist of letters`);
        }
        if (!isRecord(definition)) {
            throw new SettingsError(settingsPath, `entity '${name}' must be an object`);
        }
        const { latex, html, utf8 } = definition;
        if (typeof latex !== 'string' || typeof html !== 'string' || typeof utf8 !== 'string') {
            throw new SettingsError(settingsPath, `entity '${name}' needs string latex, html and utf8 fields`);
        }
        entities[name] = { latex, html, utf8 };
    }
    return entities;
}

/**
 * Build settings from an already parsed settings object
 */
export function resolveSettings(
    settings: Record<string, unknown>,
    settingsPath: string,
    env: NodeJS.ProcessEnv = process.env
): InlineSettings {
    let logLevel = getLogLevel(settings, settingsPath);

    const envLevel = env[LOG_LEVEL_ENV];
    if (envLevel !== undefined && envLevel !== '') {
        const normalized = envLevel.trim().toLowerCase();
        if (isLogLevelName(normalized)) {
            logLevel = normalized;
        } else {
            settingsLogger.warn(`Ignoring unknown ${LOG_LEVEL_ENV} value`, { value: envLevel });
        }
    }

    return {
        logLevel,
        anonymousFootnotePrefix: getPrefix(settings, settingsPath),
        entities: getEntities(settings, settingsPath),
    };
}

/**
 * Load settings from a file; a missing file yields the defaults
 */
export function loadSettings(
    settingsPath: string = getSettingsPath(),
    env: NodeJS.ProcessEnv = process.env
): InlineSettings {
    if (!fs.existsSync(settingsPath)) {
        settingsLogger.debug('No settings file, using defaults', { path: settingsPath });
        return resolveSettings({}, settingsPath, env);
    }

    let content: string;
    try {
        content = fs.readFileSync(settingsPath, 'utf-8');
    } catch (err) {
        throw new SettingsError(settingsPath, err instanceof Error ? err.message : String(err));
    }

    const settings = resolveSettings(parseSettingsText(content, settingsPath), settingsPath, env);
    settingsLogger.debug('Loaded settings', { path: settingsPath, logLevel: settings.logLevel });
    return settings;
}

/**
 * Apply the process-wide parts of the settings (the log level)
 */
export function applySettings(settings: InlineSettings): void {
    const level = parseLogLevel(settings.logLevel);
    if (level !== undefined) {
        getLoggingService().setLevel(level);
    }
}
