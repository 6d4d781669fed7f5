export const NAME = 'release-gate';
export const VERSION = '0.3.0';
