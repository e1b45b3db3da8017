import {
  type Attachment,
  type Detector,
  type DetectorMetadata,
  type DetectorOutput,
  type SignalInput,
  attachmentSha256,
} from '@riskweave/core';
import type { Risk } from './text.js';

const EXECUTABLE_EXTENSIONS = new Set([
  'exe',
  'scr',
  'bat',
  'cmd',
  'com',
  'pif',
  'vbs',
  'vbe',
  'js',
  'jse',
  'wsf',
  'wsh',
  'ps1',
  'msi',
  'jar',
  'hta',
  'lnk',
  'dll',
  'cpl',
  'reg',
]);
const MACRO_EXTENSIONS = new Set(['docm', 'xlsm', 'pptm', 'dotm', 'xltm']);
const ARCHIVE_EXTENSIONS = new Set(['zip', 'rar', '7z', 'iso', 'img', 'gz', 'tar']);
const DOCUMENT_EXTENSIONS = new Set(['pdf', 'doc', 'docx', 'xls', 'xlsx', 'ppt', 'pptx', 'txt', 'jpg', 'jpeg', 'png', 'csv']);

/** Leading bytes of executable and script formats */
const EXECUTABLE_MAGIC: ReadonlyArray<{ name: string; bytes: readonly number[] }> = [
  { name: 'Windows PE executable (MZ)', bytes: [0x4d, 0x5a] },
  { name: 'ELF executable', bytes: [0x7f, 0x45, 0x4c, 0x46] },
  { name: 'Script with shebang', bytes: [0x23, 0x21] },
];

const RISK_SCORES: Record<Risk, number> = { CRITICAL: 95, HIGH: 80, MEDIUM: 45, LOW: 5 };
const RISK_ORDER: readonly Risk[] = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'];

export interface AttachmentScan {
  filename: string;
  extension: string;
  risk: Risk;
  isMalware: boolean;
  reasons: string[];
  /** Hex SHA-256 of the content, or the supplied digest */
  sha256: string | null;
  sizeBytes: number | null;
}

function extensionsOf(filename: string): string[] {
  const base = filename.split(/[\\/]/).pop() ?? filename;
  return base.toLowerCase().split('.').slice(1);
}

function startsWith(content: Buffer, bytes: readonly number[]): boolean {
  return content.length >= bytes.length && bytes.every((byte, i) => content[i] === byte);
}

export function scanAttachment(attachment: Attachment): AttachmentScan {
  const extensions = extensionsOf(attachment.filename);
  const extension = extensions.length > 0 ? extensions[extensions.length - 1] : '';
  const content = attachment.contentBase64 !== undefined ? Buffer.from(attachment.contentBase64, 'base64') : null;

  const reasons: string[] = [];
  let level = 0;
  const raise = (risk: Risk, reason: string) => {
    level = Math.max(level, RISK_ORDER.indexOf(risk));
    reasons.push(reason);
  };

  if (EXECUTABLE_EXTENSIONS.has(extension)) {
    raise('CRITICAL', `Dangerous executable extension: .${extension}`);
  } else if (MACRO_EXTENSIONS.has(extension)) {
    raise('HIGH', `Macro-enabled document: .${extension}`);
  } else if (ARCHIVE_EXTENSIONS.has(extension)) {
    raise('MEDIUM', `Archive or disk image may hide its contents: .${extension}`);
  }

  const inner = extensions.length >= 2 ? extensions[extensions.length - 2] : '';
  if (DOCUMENT_EXTENSIONS.has(inner) && extension !== inner && !DOCUMENT_EXTENSIONS.has(extension)) {
    raise('HIGH', `Double extension disguises file type: .${inner}.${extension}`);
  }

  if (content) {
    for (const magic of EXECUTABLE_MAGIC) {
      if (startsWith(content, magic.bytes)) {
        raise('CRITICAL', `Executable content detected: ${magic.name}`);
      }
    }
    const head = content.subarray(0, 64 * 1024).toString('latin1');
    if (head.startsWith('%PDF') && /\/(?:JavaScript|JS|OpenAction|Launch)\b/.test(head)) {
      raise('HIGH', 'PDF with embedded script or auto-action');
    }
  }

  const sha256 = attachmentSha256(attachment) ?? null;
  const risk = RISK_ORDER[level];

  return {
    filename: attachment.filename,
    extension,
    risk,
    isMalware: risk === 'CRITICAL' || risk === 'HIGH',
    reasons,
    sha256,
    sizeBytes: content ? content.length : (attachment.sizeBytes ?? null),
  };
}

export function malwareScore(scan: AttachmentScan): number {
  return RISK_SCORES[scan.risk];
}

/**
 * Malware attachment detector
 *
 * Static checks only: file extension, disguised double extensions and the
 * magic bytes of the (optional) base64 content. Nothing is executed.
 */
export class MalwareAttachmentDetector implements Detector {
  metadata: DetectorMetadata = {
    id: 'malware-attachment',
    name: 'Malware / Attachment',
    description: 'Flags executable, macro and disguised attachments by extension and content signature',
    input: 'attachment',
    scoreKey: 'malware_score',
    version: '1.0.0',
  };

  detect(signal: SignalInput): DetectorOutput {
    if (!signal.attachment) {
      return { scores: { malware_score: 0 }, details: { reasons: [] } };
    }
    const scan = scanAttachment(signal.attachment);
    return {
      scores: { malware_score: malwareScore(scan) },
      details: { ...scan },
    };
  }
}
