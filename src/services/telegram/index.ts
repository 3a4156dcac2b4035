export { createBot, routeText, startBot, type BotDeps } from './bot';
export { deliver, type MessageApi } from './message-manager';
export {
  getCancelKeyboard,
  getCategoryPickerKeyboard,
  getConfirmDeleteKeyboard,
  getEditMenuKeyboard,
  getExpenseActionsKeyboard,
  getUpdatedKeyboard,
} from './buttons';
