// Version of the converter base, printed next to the plugin's own version
export const CORE_VERSION = "0.1.0";
