import path from 'path';
import { Document, Packer, Paragraph, HeadingLevel, TextRun, AlignmentType, Table, TableRow, TableCell, WidthType } from 'docx';
import ExcelJS from 'exceljs';
import PDFDocument from 'pdfkit';
import { buildSrtText } from './transcripts.js';
import type { TranscriptionJob, TranscriptResult } from '../models/types.js';

export type ExportFormat = 'json' | 'txt' | 'srt' | 'docx' | 'xlsx' | 'pdf';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['json', 'txt', 'srt', 'docx', 'xlsx', 'pdf'];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((f) => f === value);
}

function pad(n: number, width = 2) {
  const s = String(n);
  return s.length >= width ? s : '0'.repeat(width - s.length) + s;
}

function secToTag(sec: number, showHours: boolean) {
  const totalSec = Math.floor(sec);
  const h = Math.floor(totalSec / 3600);
  const m = Math.floor((totalSec % 3600) / 60);
  const s = totalSec % 60;
  if (showHours || h > 0) return `[${pad(h)}:${pad(m)}:${pad(s)}]`;
  return `[${pad(m)}:${pad(s)}]`;
}

function lastEnd(res: TranscriptResult) {
  return res.segments.length > 0 ? res.segments[res.segments.length - 1].end : 0;
}

function speakerCount(res: TranscriptResult) {
  return new Set(res.segments.map((s) => s.speaker).filter((s) => s !== undefined)).size;
}

function headerLines(job: TranscriptionJob, res: TranscriptResult) {
  const totalSec = Math.floor(lastEnd(res));
  const h = Math.floor(totalSec / 3600);
  const m = Math.floor((totalSec % 3600) / 60);
  const s = totalSec % 60;
  return [
    `Title: ${job.file.originalName}`,
    `Date: ${new Date(job.createdAt).toISOString().slice(0, 10)}`,
    `Duration: ${pad(h)}:${pad(m)}:${pad(s)}`,
    `Language: ${res.language ?? 'unknown'}`,
    `Speakers: ${speakerCount(res)}`,
  ];
}

function line(seg: TranscriptResult['segments'][number], showHours: boolean) {
  const ts = secToTag(seg.start, showHours);
  return seg.speaker ? `${ts} ${seg.speaker}: ${seg.text}` : `${ts} ${seg.text}`;
}

export function buildJson(job: TranscriptionJob, res: TranscriptResult) {
  return {
    id: job.id,
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
    audio: {
      originalName: job.file.originalName,
      size: job.file.size,
      mimetype: job.file.mimetype,
    },
    language: res.language ?? null,
    text: res.text,
    segments: res.segments.map((s) => ({ start: s.start, end: s.end, speaker: s.speaker ?? null, text: s.text })),
  };
}

export function buildTxtText(job: TranscriptionJob, res: TranscriptResult) {
  const showHours = lastEnd(res) >= 3600;
  const lines: string[] = [];
  lines.push('TRANSCRIPT');
  lines.push('=====================================');
  lines.push(...headerLines(job, res));
  lines.push('');
  for (const seg of res.segments) {
    lines.push(line(seg, showHours));
    lines.push('');
  }
  return lines.join('\n');
}

export { buildSrtText };

export async function buildDocxBuffer(job: TranscriptionJob, res: TranscriptResult): Promise<Buffer> {
  const showHours = lastEnd(res) >= 3600;

  const headerParas = [
    new Paragraph({
      text: 'TRANSCRIPT',
      heading: HeadingLevel.HEADING_1,
      alignment: AlignmentType.CENTER,
    }),
    new Paragraph({ text: ' ' }),
    ...headerLines(job, res).map((text) => new Paragraph({ text })),
    new Paragraph({ text: ' ' }),
  ];

  const headerCell = (text: string) =>
    new TableCell({ children: [new Paragraph({ children: [new TextRun({ text, bold: true })] })] });

  const tableRows: TableRow[] = [
    new TableRow({ children: [headerCell('Time'), headerCell('Speaker'), headerCell('Text')] }),
  ];

  for (const seg of res.segments) {
    tableRows.push(
      new TableRow({
        children: [
          new TableCell({ children: [new Paragraph(secToTag(seg.start, showHours))] }),
          new TableCell({ children: [new Paragraph(seg.speaker ?? '')] }),
          new TableCell({ children: [new Paragraph(seg.text)] }),
        ],
      })
    );
  }

  const table = new Table({
    width: { size: 100, type: WidthType.PERCENTAGE },
    rows: tableRows,
  });

  const doc = new Document({
    sections: [
      {
        children: [...headerParas, table],
      },
    ],
  });

  return Packer.toBuffer(doc);
}

export async function buildXlsxBuffer(res: TranscriptResult): Promise<Buffer> {
  const wb = new ExcelJS.Workbook();
  const ws = wb.addWorksheet(path.parse(res.file).name.slice(0, 31) || 'Transcript');
  ws.columns = [
    { header: 'Start', key: 'start', width: 12 },
    { header: 'End', key: 'end', width: 12 },
    { header: 'Speaker', key: 'speaker', width: 20 },
    { header: 'Text', key: 'text', width: 100 },
  ];
  const showHours = lastEnd(res) >= 3600;
  for (const seg of res.segments) {
    ws.addRow({
      start: secToTag(seg.start, showHours),
      end: secToTag(seg.end, showHours),
      speaker: seg.speaker ?? '',
      text: seg.text,
    });
  }
  const buf = await wb.xlsx.writeBuffer();
  return Buffer.from(buf);
}

// A4, single column, page numbers in the footer.
export async function buildPdfBuffer(job: TranscriptionJob, res: TranscriptResult): Promise<Buffer> {
  const showHours = lastEnd(res) >= 3600;

  const doc = new PDFDocument({ size: 'A4', bufferPages: true, margins: { top: 72, bottom: 72, left: 72, right: 72 } });
  const chunks: Buffer[] = [];
  return await new Promise<Buffer>((resolve, reject) => {
    doc.on('data', (c: Buffer) => chunks.push(c));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    doc.fontSize(16).text('TRANSCRIPT', { align: 'center' });
    doc.moveDown(1);
    doc.fontSize(12);
    for (const text of headerLines(job, res)) doc.text(text);
    doc.moveDown(1);

    for (const seg of res.segments) {
      doc.font('Times-Roman').fontSize(12).text(line(seg, showHours));
      doc.moveDown(0.5);
    }

    const range = doc.bufferedPageRange();
    for (let i = 0; i < range.count; i++) {
      doc.switchToPage(range.start + i);
      doc.fontSize(9).text(`${i + 1} / ${range.count}`, 0, doc.page.height - 50, { align: 'center' });
    }

    doc.end();
  });
}
