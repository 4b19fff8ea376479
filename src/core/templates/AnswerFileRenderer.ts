import type { InstallerConfig } from '../entities/InstallerConfig.js';
import { AnswerFileTemplate, AnswerSection, AnswerValue, RenderOptions } from './types.js';

const CONTROL_ESCAPES: Record<string, string> = {
  '\b': '\\b',
  '\t': '\\t',
  '\n': '\\n',
  '\f': '\\f',
  '\r': '\\r',
  '"': '\\"',
  '\\': '\\\\',
};

/**
 * TOML basic-string escaping
 */
export function escapeTomlString(value: string): string {
  let out = '';
  for (const ch of value) {
    const escape = CONTROL_ESCAPES[ch];
    if (escape !== undefined) {
      out += escape;
      continue;
    }
    const code = ch.codePointAt(0) ?? 0;
    if (code < 0x20 || code === 0x7f) {
      out += `\\u${code.toString(16).toUpperCase().padStart(4, '0')}`;
    } else {
      out += ch;
    }
  }
  return `"${out}"`;
}

function formatValue(value: AnswerValue): string {
  if (typeof value === 'string') return escapeTomlString(value);
  return `[${value.map(escapeTomlString).join(', ')}]`;
}

/**
 * Proxmox VE automated-installer answer.toml
 *
 * Format:
 * [global]
 * keyboard = "en-us"
 * ...
 *
 * [network]
 * source = "from-dhcp"
 * filter.ID_NET_NAME_MAC = "*001122334455"
 *
 * [disk-setup]
 * filesystem = "zfs"
 * zfs.raid = "raid0"
 * disk-list = ["/dev/sda"]
 */
export class ProxmoxAnswerTemplate implements AnswerFileTemplate {
  buildSections(config: InstallerConfig): AnswerSection[] {
    const { identity, network, disk } = config;

    const global: AnswerSection = {
      name: 'global',
      entries: [
        ['keyboard', identity.keyboardLayout],
        ['country', identity.country.toLowerCase()],
        ['fqdn', identity.fqdn],
        ['mailto', identity.email],
        ['timezone', identity.timezone],
        ['root-password-hashed', identity.rootPasswordHash],
      ],
    };

    const networkSection: AnswerSection =
      network.source === 'dhcp'
        ? {
            name: 'network',
            entries: [
              ['source', 'from-dhcp'],
              ['filter.ID_NET_NAME_MAC', network.macFilter],
            ],
          }
        : {
            name: 'network',
            entries: [
              ['source', 'from-answer'],
              ['cidr', network.cidr],
              ['dns', network.dns.join(',')],
              ['gateway', network.gateway],
              ['filter.ID_NET_NAME_MAC', network.macFilter],
            ],
          };

    const diskEntries: Array<readonly [string, AnswerValue]> = [['filesystem', disk.filesystem]];
    if (disk.raid !== undefined && (disk.filesystem === 'zfs' || disk.filesystem === 'btrfs')) {
      diskEntries.push([`${disk.filesystem}.raid`, disk.raid]);
    }
    diskEntries.push(['disk-list', disk.diskList]);

    return [global, networkSection, { name: 'disk-setup', entries: diskEntries }];
  }

  render(config: InstallerConfig, options: RenderOptions = {}): string {
    const blocks: string[] = [];
    if (options.generatedAt) {
      blocks.push(`# generated-at: ${options.generatedAt.toISOString()}`);
    }

    for (const section of this.buildSections(config)) {
      const lines = [`[${section.name}]`];
      for (const [key, value] of section.entries) {
        lines.push(`${key} = ${formatValue(value)}`);
      }
      blocks.push(lines.join('\n'));
    }

    return blocks.join('\n\n') + '\n';
  }

  getName(): string {
    return 'Proxmox answer.toml';
  }
}

const defaultTemplate = new ProxmoxAnswerTemplate();

export function renderAnswerFile(config: InstallerConfig, options?: RenderOptions): string {
  return defaultTemplate.render(config, options);
}
