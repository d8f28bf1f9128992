export const TELEGRAM_BOT = "TELEGRAM_BOT";
