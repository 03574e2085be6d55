export const NAME = 'mindgate';
export const VERSION = '0.1.0';
