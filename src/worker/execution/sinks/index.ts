export { createLogSink } from "./log-sink";
export { SUMMARY_HEADER, createTelegramSink, type TelegramSink } from "./telegram-sink";
