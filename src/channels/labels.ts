import type { Priority } from "@/types/notification";

type Language = "ar" | "en";

const PRIORITY_LABELS: Record<Language, Record<Priority, string>> = {
  ar: { low: "منخفض", normal: "عادي", high: "عالي", urgent: "عاجل" },
  en: { low: "Low", normal: "Normal", high: "High", urgent: "Urgent" },
};

const REFERENCE_LABELS: Record<Language, string> = {
  ar: "رقم المرجع",
  en: "Reference",
};

const SENT_AT_LABELS: Record<Language, string> = {
  ar: "تم الإرسال في",
  en: "Sent at",
};

export function resolveLanguage(language: string): Language {
  return language.toLowerCase().startsWith("en") ? "en" : "ar";
}

export function priorityLabel(priority: Priority, language: string): string {
  return PRIORITY_LABELS[resolveLanguage(language)][priority];
}

export function referenceLabel(language: string): string {
  return REFERENCE_LABELS[resolveLanguage(language)];
}

export function sentAtLabel(language: string): string {
  return SENT_AT_LABELS[resolveLanguage(language)];
}
