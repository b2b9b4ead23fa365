/**
 * Shared constants for the depsolve CLI
 */

export const CLI_NAME = 'depsolve';

export const CLI_VERSION = '0.1.0';
