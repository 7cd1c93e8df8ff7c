/**
 * Entry point for the agents' notification bot. Agents carry a
 * `telegramChatId`; the bot itself is not wired up yet.
 */
export const startBot = () => {
  console.log('🤖 Starting Telegram bot...');
};

if (require.main === module) {
  startBot();
}
