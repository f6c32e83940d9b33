export const NAME = 'rte';
export const VERSION = '0.3.0';
