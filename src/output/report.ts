import { jsPDF } from "jspdf";
import { orNone } from "../prompt.js";
import type { PetProfile, RecommendationSet } from "../types.js";
import { formatTimestamp } from "../utils/time.js";

export const REPORT_FILENAME = "pet_care_report.pdf";

export const DISCLAIMER =
  "DISCLAIMER: This report was generated using artificial intelligence. " +
  "While the recommendations are based on veterinary knowledge, they should " +
  "not replace professional veterinary advice. Always consult with a " +
  "qualified veterinarian for your pet's specific needs.";

export type ReportBlockKind = "title" | "heading" | "body" | "disclaimer";

export interface ReportBlock {
  kind: ReportBlockKind;
  text: string;
}

interface BlockStyle {
  fontStyle: "normal" | "bold" | "italic";
  fontSize: number;
  spaceAfter: number;
}

const STYLES: Record<ReportBlockKind, BlockStyle> = {
  title: { fontStyle: "bold", fontSize: 24, spaceAfter: 30 },
  heading: { fontStyle: "bold", fontSize: 16, spaceAfter: 6 },
  body: { fontStyle: "normal", fontSize: 10, spaceAfter: 12 },
  disclaimer: { fontStyle: "italic", fontSize: 10, spaceAfter: 0 },
};

const MARGIN = 72;
const LINE_SPACING = 1.25;

/** The profile summary printed under "Pet Information". */
export function describeProfile(profile: PetProfile): string {
  return [
    `Type: ${profile.species}`,
    `Breed: ${profile.breed}`,
    `Age: ${profile.age} years`,
    `Weight: ${profile.weight} kg`,
    `Health Conditions: ${orNone(profile.healthConditions)}`,
    `Allergies: ${orNone(profile.allergies)}`,
  ].join("\n");
}

/** Names the standard PDF fonts cannot draw at all fall back to a placeholder. */
function titleName(name: string): string {
  if (name.trim() !== "" && toPdfText(name).trim() === "") return "your pet";
  return name;
}

/**
 * Lay out the report as an ordered list of blocks: title, pet information,
 * one heading and body per section (in the set's order), generation time,
 * disclaimer.
 */
export function buildReportBlocks(
  profile: PetProfile,
  sections: RecommendationSet,
  generatedAt: Date,
): ReportBlock[] {
  const blocks: ReportBlock[] = [
    { kind: "title", text: `Pet Care Report for ${titleName(profile.name)}` },
    { kind: "heading", text: "Pet Information" },
    { kind: "body", text: describeProfile(profile) },
  ];

  for (const [title, content] of sections) {
    blocks.push({ kind: "heading", text: title });
    blocks.push({ kind: "body", text: content });
  }

  blocks.push({
    kind: "body",
    text: `Report Generated: ${formatTimestamp(generatedAt)}`,
  });
  blocks.push({ kind: "disclaimer", text: DISCLAIMER });
  return blocks;
}

/**
 * Model output is markdown with bullet glyphs the standard PDF fonts cannot
 * encode; reduce it to plain Latin-1 text.
 */
export function toPdfText(text: string): string {
  return text
    .replace(/\*\*/g, "")
    .replace(/^(\s*)#{1,6}\s+/gm, "$1")
    .replace(/[•∘◦▪]/g, "-")
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/[–—]/g, "-")
    .replace(/[^\n\t\x20-\x7e\xa0-\xff]/g, "");
}

/**
 * Render a profile and its recommendations as a paginated US-Letter PDF,
 * returned in memory.
 */
export function renderReport(
  profile: PetProfile,
  sections: RecommendationSet,
  generatedAt: Date = new Date(),
): Buffer {
  const doc = new jsPDF({ unit: "pt", format: "letter" });
  const pageWidth = doc.internal.pageSize.getWidth();
  const pageHeight = doc.internal.pageSize.getHeight();
  const textWidth = pageWidth - MARGIN * 2;
  let y = MARGIN;

  for (const block of buildReportBlocks(profile, sections, generatedAt)) {
    const style = STYLES[block.kind];
    const lineHeight = style.fontSize * LINE_SPACING;
    doc.setFont("helvetica", style.fontStyle);
    doc.setFontSize(style.fontSize);

    const lines: string[] = doc.splitTextToSize(
      toPdfText(block.text),
      textWidth,
    );
    for (const line of lines) {
      if (y + lineHeight > pageHeight - MARGIN) {
        doc.addPage();
        y = MARGIN;
      }
      doc.text(line, MARGIN, y + style.fontSize);
      y += lineHeight;
    }
    y += style.spaceAfter;
  }

  return Buffer.from(doc.output("arraybuffer"));
}

/** An anchor that downloads the PDF straight from a base64 data URI. */
export function toDownloadLink(pdf: Buffer): string {
  return `<a class="download" href="data:application/pdf;base64,${pdf.toString("base64")}" download="${REPORT_FILENAME}">Download PDF Report</a>`;
}
