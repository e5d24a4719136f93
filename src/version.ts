export const LAUNCHER_VERSION = '0.1.0';
