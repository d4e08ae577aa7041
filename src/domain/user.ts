import { Row } from "./table";

export type Role = "user" | "admin";

export type AccessDecision = "GRANTED_ADMIN" | "GRANTED" | "DENIED";

/** Who sent an inbound chat event, as reported by the transport. */
export interface ChatUser {
  id: number;
  username?: string;
  firstName?: string;
  lastName?: string;
}

/** A row of the Users table: id, username, display name, role. */
export interface AllowedUser {
  id: number;
  username: string;
  name: string;
  role: Role;
}

export const USERS_HEADER = ["ID", "Username", "Имя", "Роль"];
export const ACCESS_LOG_HEADER = ["Время", "ID", "Username", "Имя", "Фамилия", "Статус"];
export const ACTION_LOG_HEADER = ["Время", "ID", "Пользователь", "Действие", "Детали"];

export function isRole(value: string): value is Role {
  return value === "user" || value === "admin";
}

/** Parse a stored id cell; blank or non-numeric cells yield null. */
export function parseUserId(cell: string | undefined): number | null {
  const text = (cell ?? "").trim();
  if (!/^-?\d+$/.test(text)) return null;
  return Number(text);
}

export function userFromRow(row: Row): AllowedUser | null {
  const id = parseUserId(row[0]);
  if (id === null) return null;
  const role = (row[3] ?? "").trim();
  return {
    id,
    username: row[1] ?? "",
    name: row[2] ?? "",
    role: isRole(role) ? role : "user",
  };
}
