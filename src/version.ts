export const NAME = 'codeway';
export const VERSION = '0.4.0';
