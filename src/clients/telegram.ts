import type { AxiosInstance } from "axios";
import type { AppConfig } from "../config";
import type { Logger } from "../utils/logger";

export type TelegramSettings = AppConfig["telegram"];

export async function sendTelegramMessage(
	http: AxiosInstance,
	settings: TelegramSettings,
	text: string,
	logger: Logger,
): Promise<void> {
	if (!settings.botToken || !settings.chatId) {
		logger.warn("Telegram bot token or chat id missing, skipping notification");
		logger.info({ alert: text }, "Alert");
		return;
	}

	const url = `https://api.telegram.org/bot${settings.botToken}/sendMessage`;

	await http.post(
		url,
		{
			chat_id: settings.chatId,
			text,
			parse_mode: "Markdown",
		},
		{ timeout: 10_000 },
	);
}
