import type { Config } from "./schema.js";

export const defaultConfig: Config = {
  title: "Media Mix Modeling Report",
  report: {
    sourceFile: "report_data.html",
    outputFile: "custom_report.html",
    summaryFile: "custom_report.json"
  },
  palette: {
    primary: "#6366f1",
    secondary: "#8b5cf6",
    success: "#10b981",
    channelColors: [
      { keyword: "BASELINE", color: "#8b5cf6" },
      { keyword: "FACEBOOK", color: "#6366f1" },
      { keyword: "GOOGLE ADS", color: "#818cf8" },
      { keyword: "TIKTOK", color: "#10b981" }
    ]
  },
  runtime: {
    vega: "https://cdn.jsdelivr.net/npm/vega@5",
    vegaLite: "https://cdn.jsdelivr.net/npm/vega-lite@5",
    vegaEmbed: "https://cdn.jsdelivr.net/npm/vega-embed@6"
  }
};
