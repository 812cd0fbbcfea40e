export const APP_NAME = "wan-sentinel";
export const APP_VERSION = "1.4.1";
