export * from "./app";
export * from "./backoff";
export * from "./clock-ticker";
export * from "./config";
export * from "./render-loop";
export * from "./retry";
export * from "./scheduler";
export * from "./sleep";
export * from "./source-loop";
export * from "./stations";
export * from "./watchdog";
export * from "./fetchers/trips";
export * from "./fetchers/weather";
export * from "./network/nmcli";
export * from "./rendering/board-renderer";
export * from "./rendering/sinks";
export * from "./rendering/text";
export * from "./rendering/colors";
