import Table from 'cli-table3';
import { BUNDLE_DESCRIPTIONS } from '../bundle';
import { LabeledCode, UpdateBundle } from '../types';

export interface Painter {
  bold(s: string): string;
  cyan(s: string): string;
  yellow(s: string): string;
}

export interface ReportContext {
  chalk?: Painter;
}

const plain: Painter = {
  bold: (s) => s,
  cyan: (s) => s,
  yellow: (s) => s,
};

type Row = [string, string];

export function hex(value: number, width: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(width, '0')}`;
}

function device(d: LabeledCode): string {
  return `${d.name} (${hex(d.code, 4)})`;
}

function list(items: string[]): string {
  return items.length === 0 ? '-' : items.map((s) => `- ${s}`).join('\n');
}

function rowsFor(bundle: UpdateBundle): Row[] {
  switch (bundle.kind) {
    case 'signed': {
      const { envelope } = bundle;
      return [
        ['Bundle Type', 'Signature Envelope'],
        ['Cert Number', String(envelope.certificateId)],
        ['Cert File', envelope.certificate],
        ['Signature', `${envelope.signature.length} bytes`],
      ];
    }
    case 'ota-v1': {
      const { header } = bundle;
      return [
        ['Bundle Type', 'OTA V1'],
        ['MD5 Hash', header.md5Hash],
        ['Minimum OTA', String(header.sourceRevision)],
        ['Target OTA', String(header.targetRevision)],
        ['Device', device(header.device)],
        ['Optional', String(header.optional)],
        ['Padding Byte', `${header.padding} (${hex(header.padding, 2)})`],
      ];
    }
    case 'ota-v2': {
      const { header } = bundle;
      return [
        ['Bundle Type', 'OTA V2'],
        ['Minimum OTA', header.sourceRevision.toString()],
        ['Target OTA', header.targetRevision.toString()],
        ['Critical', String(header.critical)],
        ['Padding Byte', `${header.padding} (${hex(header.padding, 2)})`],
        ['MD5 Hash', header.md5Hash],
        [`Devices (${header.devices.length})`, list(header.devices.map(device))],
        [`Metadata (${header.metadata.length})`, list(header.metadata)],
      ];
    }
    case 'recovery-v1': {
      const { header } = bundle;
      const rows: Row[] = [
        ['Bundle Type', 'Recovery V1'],
        ['MD5 Hash', header.md5Hash],
        ['Magic 1', String(header.magic1)],
        ['Magic 2', String(header.magic2)],
        ['Minor', String(header.minor)],
        ['Header Rev', String(header.headerRevision)],
      ];
      if (header.targetOta !== undefined) {
        rows.push(['Target OTA', header.targetOta.toString()]);
      }
      if (header.target.kind === 'platform') {
        rows.push(['Platform', `${header.target.platform.name} (${hex(header.target.platform.code, 2)})`]);
        rows.push(['Board', `Unknown (${hex(header.target.board, 2)})`]);
      } else {
        rows.push(['Device', device(header.target.device)]);
      }
      return rows;
    }
    case 'recovery-v2': {
      const { header } = bundle;
      return [
        ['Bundle Type', 'Recovery V2'],
        ['Target OTA', header.targetOta.toString()],
        ['MD5 Hash', header.md5Hash],
        ['Magic 1', String(header.magic1)],
        ['Magic 2', String(header.magic2)],
        ['Minor', String(header.minor)],
        ['Platform', `${header.platform.name} (${hex(header.platform.code, 2)})`],
        ['Header Rev', String(header.headerRevision)],
        ['Board', `Unknown (${hex(header.board, 2)})`],
        [`Devices (${header.devices.length})`, list(header.devices.map(device))],
      ];
    }
  }
}

function renderTable(bundle: UpdateBundle, c: Painter): string {
  const table = new Table({
    style: {
      head: [], // We handle colors manually
      border: [],
    },
  });

  table.push([c.bold('Bundle Magic'), c.cyan(`${bundle.magic} (${BUNDLE_DESCRIPTIONS[bundle.magic]})`)]);
  for (const [key, value] of rowsFor(bundle)) {
    table.push([c.bold(key), value]);
  }
  return table.toString();
}

export function report(bundle: UpdateBundle, context: ReportContext = {}) {
  const c = context.chalk ?? plain;

  let output = renderTable(bundle, c) + '\n';
  let current = bundle;
  while (current.kind === 'signed') {
    current = current.envelope.inner;
    output += '\n' + c.yellow(`--- Wrapped bundle at offset ${current.offset} ---`) + '\n';
    output += renderTable(current, c) + '\n';
  }

  return output;
}
