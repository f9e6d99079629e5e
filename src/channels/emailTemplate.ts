import { priorityLabel, resolveLanguage, sentAtLabel } from "@/channels/labels";
import type { NotificationRecord } from "@/types/notification";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

interface EmailTemplateInput {
  record: Pick<NotificationRecord, "title" | "message" | "priority">;
  language: string;
  productName: string;
  entitySummary: string | null;
  sentAt: Date;
}

function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace("T", " ");
}

export function renderEmailHtml(input: EmailTemplateInput): string {
  const { record, language, productName, entitySummary, sentAt } = input;
  const lang = resolveLanguage(language);
  const direction = lang === "ar" ? "rtl" : "ltr";
  const messageHtml = escapeHtml(record.message).replace(/\n/g, "<br>");
  const summaryHtml = entitySummary
    ? `<div class="summary">${escapeHtml(entitySummary).replace(/\n/g, "<br>")}</div>`
    : "";

  return `<!DOCTYPE html>
<html dir="${direction}" lang="${lang}">
<head>
<meta charset="UTF-8">
<title>${escapeHtml(record.title)}</title>
<style>
body { font-family: 'Segoe UI', Tahoma, sans-serif; margin: 0; padding: 20px; background-color: #f5f5f5; }
.container { max-width: 600px; margin: 0 auto; background-color: #fff; border-radius: 10px; overflow: hidden; }
.header { background: #0056b3; color: #fff; padding: 24px; text-align: center; }
.content { padding: 24px; font-size: 16px; line-height: 1.6; color: #333; }
.priority { display: inline-block; padding: 4px 12px; border-radius: 16px; font-size: 12px; font-weight: bold; }
.priority-low { background-color: #6c757d; }
.priority-normal { background-color: #28a745; }
.priority-high { background-color: #ffc107; color: #856404; }
.priority-urgent { background-color: #dc3545; }
.summary { background-color: #f8f9fa; padding: 16px; border-radius: 5px; margin-top: 16px; }
.footer { background-color: #f8f9fa; padding: 16px; text-align: center; font-size: 13px; color: #6c757d; }
</style>
</head>
<body>
<div class="container">
<div class="header">
<h1>${escapeHtml(record.title)}</h1>
<span class="priority priority-${record.priority}">${priorityLabel(record.priority, language)}</span>
</div>
<div class="content">
<div class="message">${messageHtml}</div>
${summaryHtml}
</div>
<div class="footer">
<p>${escapeHtml(productName)}</p>
<p>${sentAtLabel(language)}: ${formatTimestamp(sentAt)}</p>
</div>
</div>
</body>
</html>`;
}
