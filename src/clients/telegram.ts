import axios from "axios";
import { config } from "../config";
import type { NotificationSink } from "../types";
import { logger } from "../utils/logger";

type TelegramCredentials = {
	botToken: string;
	chatId: string;
};

export class TelegramNotificationSink implements NotificationSink {
	constructor(
		private readonly credentials: TelegramCredentials = config.telegram,
	) {}

	async send(instrument: string, text: string): Promise<void> {
		const { botToken, chatId } = this.credentials;
		if (!botToken || !chatId) {
			logger.warn(
				{ instrument },
				"Telegram bot token or chat id missing, skipping notification",
			);
			return;
		}

		await axios.post(`https://api.telegram.org/bot${botToken}/sendMessage`, {
			chat_id: chatId,
			text,
			parse_mode: "Markdown",
		});
	}
}
