/**
 * Gateway-wide constants shared by the auth, response and listing modules.
 */

/** Protection space presented in every Basic and Digest challenge. */
export const DAV_REALM = 'DAV Gateway';

/** Block size used when slicing eager bodies and reading files without zero-copy. */
export const RESPONSE_DATA_BLOCK_SIZE = 64 * 1024;

/** Bodies with a known length below this are never compressed. */
export const DEFAULT_COMPRESSION_CONTENT_MINIMUM_LENGTH = 1000;

/** Content types that are always candidates for compression (prefix-anchored). */
export const DEFAULT_COMPRESSION_CONTENT_TYPE_RULE =
  '^text/|^application/(?:xml|json|javascript|xhtml\\+xml)';

const HIDE_RULE_GATEWAY = '.+\\.dav-tmp$';
const HIDE_RULE_MACOS = '^\\.DS_Store$|^\\._';
const HIDE_RULE_WINDOWS = '^Thumbs\\.db$|^desktop\\.ini$';
const HIDE_RULE_SYNOLOGY = '^#recycle$|^@eaDir$';

/**
 * Built-in directory-hide rules, keyed by user-agent pattern.
 * The empty key applies to every client. macOS Finder sends `WebDAVFS/x (…) Darwin/y`.
 */
export const DEFAULT_HIDE_FILE_IN_DIR_RULES: Readonly<Record<string, string>> = {
  '': HIDE_RULE_GATEWAY,
  'WebDAVFS|.*Darwin/': [HIDE_RULE_WINDOWS, HIDE_RULE_SYNOLOGY].join('|'),
  'Microsoft-WebDAV-MiniRedir': [HIDE_RULE_MACOS, HIDE_RULE_SYNOLOGY].join('|'),
};
