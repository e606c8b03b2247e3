export const SERVICE_NAME = 'querywarden';
export const SERVICE_VERSION = '0.1.0';
