import { runQuery } from "@/database/query";
import type { User, UserDirectory } from "@/types/user";

type UserRow = {
  id: string;
  email: string | null;
  phone: string | null;
  whatsapp_number: string | null;
  language: string | null;
  active: boolean | null;
};

const DEFAULT_LANGUAGE = "ar";

function contactOrNull(value: string | null): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    email: contactOrNull(row.email),
    phone: contactOrNull(row.phone),
    whatsappNumber: contactOrNull(row.whatsapp_number),
    language: row.language ?? DEFAULT_LANGUAGE,
    active: row.active ?? true,
  };
}

/** Reads users from the identity tables shared with the rest of the platform. */
export const pgUserDirectory: UserDirectory = {
  async getUser(userId: string): Promise<User | null> {
    const result = await runQuery<UserRow>(
      "load user",
      `SELECT id::text AS id, email, phone, whatsapp_number, language, active FROM users WHERE id::text = $1`,
      [userId],
    );

    const row = result.rows[0];
    return row ? mapUserRow(row) : null;
  },
};
