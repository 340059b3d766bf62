export const NAME = 'adaptive-container';
export const VERSION = '0.1.0';
