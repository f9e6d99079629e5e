export interface User {
  id: string;
  email: string | null;
  phone: string | null;
  whatsappNumber: string | null;
  language: string;
  active: boolean;
}

export interface UserDirectory {
  getUser(userId: string): Promise<User | null>;
}

/** Optional collaborator that renders a short text summary of a related business entity. */
export interface EntitySummaryRenderer {
  renderEntitySummary(entityId: string): Promise<string | null>;
}
