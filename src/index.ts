/**
 * org-inline: inline markup grammar for org-mode text
 */

export { parseInline, getDispatchOrder, mergePlainText, scanLiteral } from './parser/inlineParser';
export { InlineSession, createSessionFromSettings, DEFAULT_ANONYMOUS_PREFIX } from './parser/inlineSession';
export type { InlineSessionOptions } from './parser/inlineSession';
export type { GrammarName } from './parser/inlineGrammar';
export * from './parser/inlineTypes';
export { InlineError, InlineInvariantError, InlineSerializationError } from './parser/inlineErrors';
export { toPlainText, toOrgText, serializeInlineNode, formatTimestamp, formatLinkUrl } from './parser/inlineText';
export { serializeInline, deserializeInline, INLINE_FORMAT_VERSION } from './parser/inlineSerialize';
export {
    defaultDateTimeGrammar,
    parseDate,
    parseTime,
    parseRepeater,
    timestampPointToDate,
    formatTimestampPoint,
    formatRepetition,
} from './parser/orgDateTime';
export type { DateTimeGrammar, RepeaterResult } from './parser/orgDateTime';
export {
    ORG_ENTITIES,
    getEntity,
    isValidEntity,
    getAllEntityNames,
    createEntityLookup,
    defaultEntityLookup,
} from './parser/orgEntities';
export type { EntityDefinition, EntityGlyph, EntityLookup } from './parser/orgEntities';
export {
    loadSettings,
    resolveSettings,
    applySettings,
    getSettingsPath,
    SettingsError,
    DEFAULT_SETTINGS,
    SETTINGS_FILENAME,
    LOG_LEVEL_ENV,
} from './config/settings';
export type { InlineSettings } from './config/settings';
export { createLogger, getLoggingService, LogLevel, Logger, LoggingService } from './utils/logger';
export type { LogSink, LogLevelName } from './utils/logger';
