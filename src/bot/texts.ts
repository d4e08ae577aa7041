/**
 * User-facing texts of the chat flows.
 *
 * Everything returned here is HTML; values that come from the table or
 * from users are escaped on the way in.
 */

import { formatLogTimestamp, formatRosterDate, monthName } from "../domain/dates";
import { AppError, BackingStoreError, NotFoundError, ValidationError } from "../domain/errors";
import { BirthdayEntry, CardField, HomeroomGroup } from "../domain/roster";
import { bold, code, escapeHtml } from "../lib/html";
import { AccessLogEntry, SystemStats } from "../services/accessControl";

// ============================================
// Triggers and button labels
// ============================================

/** Texts that reset the conversation to the root menu from any state. */
export const MAIN_MENU_TRIGGERS: readonly string[] = ["/start", "/menu", "В главное меню", "Меню", "меню"];

/** Leave the question and picker states (compared lower-cased). */
export const EXIT_PHRASES: readonly string[] = ["/menu", "меню", "отмена", "назад", "/start", "/help"];

export const LABELS = {
  openMiniApp: "🔐 Войти в базу данных",
  botMenu: "🤖 Меню бота",
  adminPanel: "🛡️ Админ панель",
  view: "🔍 Найти / Просмотреть",
  edit: "✏️ Редактировать карточку",
  create: "➕ Создать карточку",
  ask: "🤖 Задать вопрос AI",
  other: "⭐ Остальное",
  back: "⬅️ Назад",
  backToLetters: "⬅️ Назад к буквам",
  backToPeople: "⬅️ К списку имен",
  toMainMenu: "🏠 В главное меню",
  mainMenu: "🏠 Главное меню",
  addCategory: "➕ Доб. категорию",
  save: "💾 СОХРАНИТЬ",
  cancel: "❌ Отмена",
  adminUsers: "👥 Список пользователей",
  adminStats: "📊 Статистика",
  adminLogs: "📋 Логи доступа",
  adminSummary: "🤖 Статистика AI",
  adminAdd: "➕ Добавить пользователя",
  adminRemove: "➖ Удалить пользователя",
  adminReload: "🔄 Обновить базу",
  backToAdmin: "⬅️ Назад в админ-панель",
  homerooms: "🏠 Домашки",
  birthdays: "🎂 Дни рождения",
  backToMonths: "⬅️ Назад к месяцам",
  backToHomerooms: "⬅️ Назад к Домашкам",
} as const;

// ============================================
// Menus and commands
// ============================================

export const MAIN_MENU_TEXT = bold("⛪ Церковная база данных") + "\nВыберите действие:";
export const BOT_MENU_TEXT = bold("🤖 Меню бота") + "\nВыберите действие:";
export const ADMIN_MENU_TEXT = bold("🛡️ Админ панель") + "\nВыберите действие:";
export const OTHER_MENU_TEXT = bold("⭐ Остальное") + "\nВыберите действие:";

export const WELCOME_TEXT =
  bold("🎉 Добро пожаловать в Церковную базу данных!") +
  "\n\n" +
  "Я помогу вам управлять информацией о прихожанах.\n\n" +
  "📊 Функции бота:\n" +
  "• 🔍 Поиск и просмотр карточек\n" +
  "• ✏️ Редактирование информации\n" +
  "• ➕ Создание новых записей\n" +
  "• 🤖 AI-ассистент для анализа данных\n" +
  "• 🛡️ Админ-панель для управления доступом\n\n" +
  "Используйте /menu для основного меню";

export const HELP_TEXT =
  bold("📚 Справка по командам") +
  "\n\n" +
  `${code("/start")} - Начать работу с ботом\n` +
  `${code("/menu")} - Главное меню\n` +
  `${code("/help")} - Эта справка\n` +
  `${code("/view")} - Поиск и просмотр карточек\n` +
  `${code("/edit")} - Редактирование карточек\n` +
  `${code("/create")} - Создание новой карточки\n` +
  `${code("/ask")} - Задать вопрос AI\n\n` +
  bold("🛡️ Админ команды:") +
  "\n" +
  `${code("/admin")} - Админ панель\n` +
  `${code("/admin users")} - Список пользователей\n` +
  `${code("/admin stats")} - Статистика\n` +
  `${code("/admin logs")} - Логи доступа\n` +
  `${code("/admin reload")} - Обновить базу\n` +
  `${code("/admin reload_users")} - Обновить только пользователей\n` +
  `${code("/admin reload_logs")} - Обновить только логи\n\n` +
  "Или используйте кнопки в меню для удобной навигации.";

export const ADMIN_HELP_TEXT =
  bold("📋 Доступные команды админа:") +
  "\n\n" +
  `${code("/admin")} - Админ панель\n` +
  `${code("/admin users")} - Список пользователей\n` +
  `${code("/admin logs")} - Логи доступа\n` +
  `${code("/admin stats")} - Статистика\n` +
  `${code("/admin reload")} - Обновить базу из таблицы\n` +
  `${code("/admin reload_users")} - Обновить только пользователей\n` +
  `${code("/admin reload_logs")} - Обновить только логи\n` +
  `${code("/admin add USER_ID [admin/user]")} - Добавить пользователя\n` +
  `${code("/admin remove USER_ID")} - Удалить пользователя\n` +
  `${code("/admin help")} - Эта справка`;

export const UNKNOWN_COMMAND = "❓ Неизвестная команда. Список команд: /help";
export const UNKNOWN_ADMIN_COMMAND = "❌ Неизвестная команда. Используйте /admin help для списка команд";
export const UNKNOWN_BUTTON = "Неизвестная команда";
export const STALE_MENU = "⌛ Это меню устарело. Откройте его заново.";
export const NOT_ADMIN = "❌ У вас нет прав администратора.";

export function accessDenied(userId: number): string {
  return (
    bold("⛔ Доступ запрещен") +
    "\n\n" +
    "У вас нет прав для использования этого бота.\n\n" +
    `Ваш ID: ${code(String(userId))}\n` +
    "Обратитесь к администратору, чтобы получить доступ."
  );
}

// ============================================
// Browsing
// ============================================

export const CHOOSE_LETTER = "🔤 Выберите первую букву имени:";
export const CHOOSE_PERSON = "👤 Выберите человека:";
export const ROSTER_EMPTY = "В базе нет данных. Создайте первую карточку.";
export const PERSON_NOT_FOUND = "❌ Человек не найден (возможно, удален).";

export function noNamesForLetter(letter: string): string {
  return `Нет имен на букву ${escapeHtml(letter)}`;
}

export function cardText(fields: readonly CardField[]): string {
  let text = bold("📋 Информация о прихожанине:") + "\n\n";
  if (fields.length === 0) {
    return text + "(Нет данных)";
  }
  for (const field of fields) {
    text += `🔹 ${bold(escapeHtml(field.header))}: ${escapeHtml(field.value)}\n`;
  }
  return text;
}

// ============================================
// Builder
// ============================================

export function builderHeader(mode: "CREATE" | "EDIT"): string {
  const modeText = mode === "CREATE" ? "создания" : "редактирования";
  return bold(`📝 Режим ${modeText}`) + "\nНажмите на категорию, чтобы изменить её:";
}

/** Field button label: plain header, or `✅ header: value` once filled. */
export function fieldLabel(header: string, value: string | undefined, isDate: boolean): string {
  if (value === undefined) return header;
  return `✅ ${header}: ${isDate ? formatRosterDate(value) : value}`;
}

export function valuePrompt(field: string, current: string | undefined, isDate: boolean): string {
  let text = `Введите значение для ${bold(escapeHtml(field))}:\n`;
  if (isDate) {
    text += "Формат: ДД.ММ.ГГГГ (например: 04.05.1998)\n";
  }
  if (current) {
    text += `(Текущее: ${escapeHtml(isDate ? formatRosterDate(current) : current)})`;
  }
  return text;
}

export function choicePrompt(field: string, current: string | undefined): string {
  return (
    bold(`Выберите значение для '${escapeHtml(field)}':`) +
    "\n\n" +
    `(Текущее: ${escapeHtml(current ?? "Не выбрано")})`
  );
}

export function invalidChoice(field: string): string {
  return `❌ Неверный выбор для ${escapeHtml(field)}.`;
}

export const NEW_CATEGORY_PROMPT = "Напишите название новой категории:";

export function categoryExists(name: string): string {
  return `❌ Категория '${escapeHtml(name)}' уже существует!`;
}

export function categoryAdded(name: string): string {
  return `✅ Категория '${escapeHtml(name)}' добавлена!`;
}

export const CARD_CREATED = "✅ Карточка успешно создана!";
export const CARD_UPDATED = "✅ Данные обновлены!";

// ============================================
// Assistant
// ============================================

export const ASSISTANT_INTRO =
  bold("🤖 AI Ассистент") +
  "\n\n" +
  "Задайте вопрос о данных в таблице.\n" +
  "Например:\n" +
  "• Сколько всего записей в базе?\n" +
  "• Кто родился в мае?\n" +
  "• Покажи всех с фамилией Цой\n" +
  "• Сколько человек приняли крещение в 2025 году?\n" +
  "• Сколько человек старше 60 лет?\n\n" +
  "Отправьте ваш вопрос или /menu для выхода:";

export const ASSISTANT_THINKING = "🤔 Анализирую ваш вопрос...";
export const ASSISTANT_EMPTY_TABLE = "📭 База данных пуста или содержит только заголовки.";

export function assistantAnswer(answer: string): string {
  return (
    bold("🤖 Ответ AI:") + `\n\n${escapeHtml(answer)}\n\n` + "Задайте еще вопрос или /menu для выхода"
  );
}

// ============================================
// Admin
// ============================================

export const ADD_USER_PROMPT =
  "Введите ID пользователя для добавления (число):\n\n" +
  "Формат: 123456789\n" +
  "Или с указанием роли: 123456789 admin";
export const REMOVE_USER_PROMPT = "Введите ID пользователя для удаления (число):";
export const ADD_USER_FORMAT_ERROR =
  "❌ Неверный формат ID. Введите число (и опционально 'admin' для прав администратора).";
export const REMOVE_USER_FORMAT_ERROR = "❌ Неверный формат ID. Введите число.";
export const COMMAND_ID_FORMAT_ERROR = "❌ Неверный формат ID пользователя.";
export const RELOADING_ALL = "🔄 Обновляю ВСЕ таблицы...";
export const SUMMARIZING = "🤖 Анализирую таблицу...";

export function statsText(stats: SystemStats): string {
  let text = bold("📊 Статистика системы") + "\n\n";

  if (stats.database) {
    text += bold("📁 База данных:") + "\n";
    text += `   📝 Записей: ${stats.database.records}\n`;
    text += `   🏷️ Категорий: ${stats.database.columns}\n\n`;
  }
  if (stats.users) {
    text += bold("👥 Пользователи:") + "\n";
    text += `   👑 Админов: ${stats.users.admins}\n`;
    text += `   👤 Пользователей: ${stats.users.regular}\n`;
    text += `   👥 Всего: ${stats.users.total}\n\n`;
  }
  if (stats.logs) {
    text += bold("📋 Логи доступа:") + "\n";
    text += `   ✅ Успешных: ${stats.logs.granted}\n`;
    text += `   ❌ Отказов: ${stats.logs.denied}\n`;
    text += `   📊 Всего: ${stats.logs.total}\n`;
  }
  return text;
}

/** Access log entries, oldest first; rows without a readable timestamp are skipped. */
export function accessLogText(entries: readonly AccessLogEntry[]): string {
  if (entries.length === 0) {
    return "📭 Логи доступа отсутствуют.";
  }

  let text = bold(`📋 Последние ${entries.length} попыток доступа`) + "\n\n";
  for (const entry of entries) {
    const timestamp = formatLogTimestamp(entry.timestamp);
    if (timestamp === null) continue;

    text += bold(timestamp) + "\n";
    text += `ID: ${code(escapeHtml(entry.userId || "N/A"))}\n`;
    text += `Имя: ${escapeHtml(entry.firstName || "Не указано")}\n`;
    text += `Статус: ${entry.status === "DENIED" ? "❌ Отказано" : "✅ Разрешено"}\n`;
    text += "---\n";
  }
  return text;
}

export function summaryText(summary: string, records: number, columns: number): string {
  return (
    bold("📊 Анализ таблицы AI") +
    "\n\n" +
    `${escapeHtml(summary)}\n\n` +
    `📈 Общее количество записей: ${bold(String(records))}\n` +
    `🏷️ Количество категорий: ${bold(String(columns))}\n\n` +
    "AI готов отвечать на вопросы о данных!"
  );
}

export function reloadedAll(rows: number): string {
  return (
    "✅ Все таблицы обновлены!\n" +
    `Загружено строк: ${rows}\n\n` +
    "✅ Основная таблица\n" +
    "✅ Таблица Users\n" +
    "✅ Таблица AccessLog"
  );
}

export function reloadedTable(table: string, rows: number): string {
  return `✅ Таблица ${escapeHtml(table)} обновлена!\nЗагружено: ${rows} строк`;
}

// ============================================
// Other: birthdays and homerooms
// ============================================

export const BIRTHDAYS_TEXT = bold("🎂 Дни рождения") + "\n\nВыберите месяц:";
export const HOMEROOMS_TEXT = bold("🏠 Домашки") + "\n\nВыберите группу для просмотра:";
export const CHOOSE_MONTH_WITH_BUTTONS = "Выберите месяц с помощью кнопок.";
export const CHOOSE_GROUP_WITH_BUTTONS = "Выберите группу с помощью кнопок.";

const UNKNOWN_BIRTH_YEAR = 1900;

export function birthdaysText(month: number, entries: readonly BirthdayEntry[]): string {
  const title = bold(`🎂 Дни рождения в ${monthName(month)}`) + "\n\n";
  if (entries.length === 0) {
    return title + "В этом месяце дней рождения нет.";
  }

  let text = title;
  for (const entry of entries) {
    const day = String(entry.day).padStart(2, "0");
    const year = entry.year !== UNKNOWN_BIRTH_YEAR ? ` (${entry.year} г.)` : "";
    text += `   • ${day}. ${escapeHtml(entry.name)}${year} [#${entry.rowNumber}]\n`;
  }
  return text;
}

export function groupButtonLabel(group: HomeroomGroup): string {
  return `${group.name} (${group.members.length} чел.)`;
}

export function homeroomText(group: HomeroomGroup): string {
  let text = bold(`🏠 Люди в группе: ${escapeHtml(group.name)} (${group.members.length} чел.)`) + "\n\n";
  for (const member of group.members) {
    const details: string[] = [];
    if (member.age !== null) details.push(`${member.age} лет`);
    if (member.status) details.push(member.status);
    const suffix = details.length > 0 ? ` (${escapeHtml(details.join(", "))})` : "";
    text += `   • ${escapeHtml(member.name)}${suffix}\n`;
  }
  return text;
}

// ============================================
// Failures
// ============================================

/** Text shown when a handler fails; the session is left as it was. */
export function errorText(error: unknown): string {
  if (error instanceof NotFoundError) {
    return error.rowNumber !== undefined
      ? PERSON_NOT_FOUND
      : "❌ Нужные данные не найдены в таблице. Обновите меню и попробуйте снова.";
  }
  if (error instanceof ValidationError) {
    return error.rowNumber !== undefined
      ? "❌ Запись изменилась, пока вы её редактировали. Откройте её заново."
      : "❌ Некорректные данные. Проверьте ввод и попробуйте снова.";
  }
  if (error instanceof BackingStoreError) {
    return "❌ Не удалось связаться с таблицей. Попробуйте еще раз.";
  }
  if (error instanceof AppError) {
    return "❌ Сервис временно недоступен. Попробуйте еще раз.";
  }
  return "❌ Ошибка обработки. Попробуйте еще раз.";
}
