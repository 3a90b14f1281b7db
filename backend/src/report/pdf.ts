import { PDFDocument, StandardFonts, rgb } from "pdf-lib";
import type { PDFFont, PDFPage } from "pdf-lib";
import { z } from "zod";

const field = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined || v === "" ? "--" : String(v)));

export const ReportFieldsSchema = z.object({
  candidate_id: field,
  detected_language: field,
  quality_score: field,
  integrity_check: field,
  plagiarism_check: field,
  compliance_status: field,
  maintainability_index: field,
  readability_score: field,
  original_code: field,
  final_code: field,
  error_log_text: field,
  time_analysis: field,
  explanation_text: field
});

export type ReportFields = z.infer<typeof ReportFieldsSchema>;

const PAGE_SIZE: [number, number] = [595.28, 841.89];
const MARGIN = 48;

export function sanitizeRenderableText(value: string): string {
  return value
    .replace(/\r\n?/g, "\n")
    .replace(/\t/g, "    ")
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'")
    .replace(/[–—]/g, "-")
    .replace(/…/g, "...")
    .replace(/[^\x0A\x20-\x7E\xA0-\xFF]/gu, "?");
}

export function wrapLine(line: string, maxWidth: number, font: PDFFont, size: number): string[] {
  if (!line) return [""];
  const out: string[] = [];
  let current = "";
  for (const ch of line) {
    const next = current + ch;
    if (font.widthOfTextAtSize(next, size) > maxWidth && current) {
      const breakAt = current.lastIndexOf(" ");
      if (breakAt > 0) {
        out.push(current.slice(0, breakAt));
        current = current.slice(breakAt + 1) + ch;
      } else {
        out.push(current);
        current = ch;
      }
    } else {
      current = next;
    }
  }
  out.push(current);
  return out;
}

class ReportWriter {
  private page: PDFPage;
  private y: number;

  constructor(
    private readonly pdf: PDFDocument,
    private readonly fonts: { regular: PDFFont; bold: PDFFont; mono: PDFFont }
  ) {
    this.page = pdf.addPage(PAGE_SIZE);
    this.y = PAGE_SIZE[1] - MARGIN;
  }

  private ensureSpace(height: number): void {
    if (this.y - height >= MARGIN) return;
    this.page = this.pdf.addPage(PAGE_SIZE);
    this.y = PAGE_SIZE[1] - MARGIN;
  }

  private get width(): number {
    return PAGE_SIZE[0] - MARGIN * 2;
  }

  title(text: string): void {
    this.ensureSpace(30);
    this.page.drawText(sanitizeRenderableText(text), {
      x: MARGIN,
      y: this.y - 20,
      size: 18,
      font: this.fonts.bold,
      color: rgb(0.1, 0.1, 0.1)
    });
    this.y -= 34;
  }

  heading(text: string): void {
    this.ensureSpace(28);
    this.y -= 8;
    this.page.drawText(sanitizeRenderableText(text), {
      x: MARGIN,
      y: this.y - 12,
      size: 12,
      font: this.fonts.bold,
      color: rgb(0.15, 0.15, 0.15)
    });
    this.y -= 20;
  }

  paragraph(text: string, mono = false): void {
    const font = mono ? this.fonts.mono : this.fonts.regular;
    const size = mono ? 8.5 : 10;
    const lineHeight = size + 3;
    for (const raw of sanitizeRenderableText(text).split("\n")) {
      for (const row of wrapLine(raw, this.width, font, size)) {
        this.ensureSpace(lineHeight);
        this.page.drawText(row, { x: MARGIN, y: this.y - size, size, font, color: rgb(0.2, 0.2, 0.2) });
        this.y -= lineHeight;
      }
    }
  }

  field(label: string, value: string): void {
    this.paragraph(`${label}: ${value}`);
  }
}

export async function renderReportPdf(fields: ReportFields, generatedAt = new Date()): Promise<Uint8Array> {
  const pdf = await PDFDocument.create();
  pdf.setTitle("Code Assessment Report");
  pdf.setCreationDate(generatedAt);

  const writer = new ReportWriter(pdf, {
    regular: await pdf.embedFont(StandardFonts.Helvetica),
    bold: await pdf.embedFont(StandardFonts.HelveticaBold),
    mono: await pdf.embedFont(StandardFonts.Courier)
  });

  writer.title("Code Assessment Report");
  writer.field("Generated", generatedAt.toISOString());
  writer.field("Candidate ID", fields.candidate_id);

  writer.heading("Status");
  writer.field("Detected Language", fields.detected_language);
  writer.field("Quality Score", `${fields.quality_score}/100`);
  writer.field("Integrity", fields.integrity_check);
  writer.field("Plagiarism Check", fields.plagiarism_check);
  writer.field("Compliance", fields.compliance_status);
  writer.field("Maintainability Index", fields.maintainability_index);
  writer.field("Readability Score", fields.readability_score);

  writer.heading("Original Code");
  writer.paragraph(fields.original_code, true);

  writer.heading("Fixed Code");
  writer.paragraph(fields.final_code, true);

  writer.heading("Error Log");
  writer.paragraph(fields.error_log_text);

  writer.heading("Complexity Analysis");
  writer.paragraph(fields.time_analysis, true);

  writer.heading("Line-by-Line Explanation");
  writer.paragraph(fields.explanation_text);

  return pdf.save();
}

export function reportFilename(now = new Date()): string {
  return `Code_Assessment_Report_${now.getTime()}.pdf`;
}
