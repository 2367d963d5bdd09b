import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    DEFAULT_ATTRIBUTES, DEFAULT_CONFIG, DEFAULT_SCRIPTABLE_ATTRIBUTES, DEFAULT_TAGS,
    REQUIRED_TAGS, FORBIDDEN_TAGS, configFromEnv, createConfig, resolveWhitelist,
} from '../src/modules/config';

describe('resolveWhitelist', () => {
    const builtIn = ['p', 'b'];

    it('should fall back to the built-in list', () => {
        expect(resolveWhitelist(undefined, builtIn)).toEqual(['p', 'b']);
        expect(resolveWhitelist({}, builtIn)).toEqual(['p', 'b']);
    });

    it('should append a supplemental list', () => {
        expect(resolveWhitelist({ supplemental: ['i'] }, builtIn)).toEqual(['p', 'b', 'i']);
    });

    it('should replace with a custom list', () => {
        expect(resolveWhitelist({ custom: ['em'] }, builtIn)).toEqual(['em']);
    });

    it('should prefer custom over supplemental', () => {
        expect(resolveWhitelist({ custom: ['em'], supplemental: ['i'] }, builtIn)).toEqual(['em']);
    });

    it('should treat an empty custom list as unset', () => {
        expect(resolveWhitelist({ custom: [], supplemental: ['i'] }, builtIn)).toEqual(['p', 'b', 'i']);
    });

    it('should return a copy of the built-in list', () => {
        expect(resolveWhitelist(undefined, builtIn)).not.toBe(builtIn);
    });
});

describe('createConfig', () => {
    it('should produce the defaults with no options', () => {
        expect(DEFAULT_CONFIG.tags).toEqual(DEFAULT_TAGS);
        expect(DEFAULT_CONFIG.attributes).toEqual(DEFAULT_ATTRIBUTES);
        expect(DEFAULT_CONFIG.scriptableAttributes).toEqual(DEFAULT_SCRIPTABLE_ATTRIBUTES);
        expect(DEFAULT_CONFIG.requiredTags).toEqual(['#document-fragment', '#text']);
        expect(DEFAULT_CONFIG.forbiddenTags).toEqual(['noscript', 'plaintext']);
        expect(DEFAULT_CONFIG.failureMode).toBe('drop');
    });

    it('should freeze the config and its lists', () => {
        const config = createConfig({ tags: { custom: ['p'] } });
        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.tags)).toBe(true);
        expect(Object.isFrozen(REQUIRED_TAGS)).toBe(true);
        expect(Object.isFrozen(FORBIDDEN_TAGS)).toBe(true);
    });

    it('should resolve each list independently', () => {
        const config = createConfig({
            tags: { custom: ['p'] },
            attributes: { supplemental: ['class'] },
        });
        expect(config.tags).toEqual(['p']);
        expect(config.attributes).toEqual([...DEFAULT_ATTRIBUTES, 'class']);
        expect(config.scriptableAttributes).toEqual(DEFAULT_SCRIPTABLE_ATTRIBUTES);
    });
});

describe('configFromEnv', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should use the defaults for an empty environment', () => {
        const config = configFromEnv({});
        expect(config.tags).toEqual(DEFAULT_TAGS);
        expect(config.failureMode).toBe('drop');
    });

    it('should read comma-separated lists', () => {
        const config = configFromEnv({
            SANITIZER_TAGS: 'p, b ,',
            SANITIZER_EXTRA_ATTRIBUTES: 'class',
            SANITIZER_SCRIPTABLE_ATTRIBUTES: 'href',
        });
        expect(config.tags).toEqual(['p', 'b']);
        expect(config.attributes).toEqual([...DEFAULT_ATTRIBUTES, 'class']);
        expect(config.scriptableAttributes).toEqual(['href']);
    });

    it('should ignore blank lists', () => {
        expect(configFromEnv({ SANITIZER_TAGS: ' , ' }).tags).toEqual(DEFAULT_TAGS);
    });

    it('should read the failure mode case-insensitively', () => {
        expect(configFromEnv({ SANITIZER_FAILURE_MODE: 'THROW' }).failureMode).toBe('throw');
    });

    it('should warn and drop on an unknown failure mode', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        expect(configFromEnv({ SANITIZER_FAILURE_MODE: 'explode' }).failureMode).toBe('drop');
        expect(warn).toHaveBeenCalledWith('[config] Unknown SANITIZER_FAILURE_MODE "explode", using "drop"');
    });
});
