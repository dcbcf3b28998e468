import type { ReportInput } from "./templates/reportTemplate.js";
import { renderReportTemplate } from "./templates/reportTemplate.js";

export function buildHtmlReport(input: ReportInput): string {
  return renderReportTemplate(input);
}
