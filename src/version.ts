export const NAME = 'voxbridge';
export const VERSION = '0.4.0';
