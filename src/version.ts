export const NAME = 'kernelgen';
export const VERSION = '0.1.0';
