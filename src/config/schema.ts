import { z } from "zod";

const MAX_TITLE_LENGTH = 200;
const MAX_FILE_NAME_LENGTH = 255;
const MAX_CHANNEL_COLORS = 50;

const HEX_COLOR = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;

export const HexColorSchema = z
  .string()
  .regex(HEX_COLOR, { message: "Colour must be a hex value such as #6366f1" });

// Artifacts are always written beside the source report, never elsewhere.
export const FileNameSchema = z
  .string()
  .min(1)
  .max(MAX_FILE_NAME_LENGTH)
  .refine((name) => !/[\\/]/.test(name) && name !== "." && name !== "..", {
    message: "Must be a plain file name without directory separators"
  });

export const ChannelColorSchema = z.object({
  keyword: z.string().min(1).max(100),
  color: HexColorSchema
});

export const PaletteSchema = z.object({
  primary: HexColorSchema,
  secondary: HexColorSchema,
  success: HexColorSchema,
  channelColors: z.array(ChannelColorSchema).max(MAX_CHANNEL_COLORS)
});

const RuntimeUrlSchema = z
  .string()
  .url()
  .refine((candidate) => candidate.startsWith("https://"), {
    message: "Chart runtime must be loaded over https"
  });

export const ReportFilesSchema = z
  .object({
    sourceFile: FileNameSchema,
    outputFile: FileNameSchema,
    summaryFile: FileNameSchema.nullable()
  })
  .refine((files) => files.outputFile !== files.sourceFile, {
    message: "outputFile must differ from sourceFile",
    path: ["outputFile"]
  })
  .refine(
    (files) => files.summaryFile !== files.sourceFile && files.summaryFile !== files.outputFile,
    { message: "summaryFile must differ from sourceFile and outputFile", path: ["summaryFile"] }
  );

export const ConfigSchema = z.object({
  title: z.string().min(1).max(MAX_TITLE_LENGTH),
  report: ReportFilesSchema,
  palette: PaletteSchema,
  runtime: z.object({
    vega: RuntimeUrlSchema,
    vegaLite: RuntimeUrlSchema,
    vegaEmbed: RuntimeUrlSchema
  })
});

export type Config = z.infer<typeof ConfigSchema>;
export type Palette = z.infer<typeof PaletteSchema>;
export type ReportFiles = z.infer<typeof ReportFilesSchema>;
export type ChartRuntime = Config["runtime"];
