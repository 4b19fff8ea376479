import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { InstallerOptions } from '../../core/validation/ConfigValidator.js';

export const DEFAULT_OPTIONS_FILE = path.resolve(__dirname, '../../../data/installer-options.json');

const FALLBACK_COUNTRY = 'US';
const FALLBACK_TIMEZONE = 'America/New_York';

const OptionsFileSchema = z.object({
  countries: z.array(z.string().regex(/^[A-Z]{2}$/)).min(1),
  keyboards: z
    .array(z.object({ code: z.string().min(1), name: z.string().min(1) }))
    .min(1),
});

export interface CountryOption {
  code: string;
  name: string;
}

export interface KeyboardOption {
  code: string;
  name: string;
}

/**
 * Choices offered by the installer form
 */
export interface InstallerSettings {
  countries: CountryOption[];
  keyboards: KeyboardOption[];
  timezones: string[];
  currentCountry: string;
  currentTimezone: string;
}

function runtimeTimezones(): string[] {
  const zones = new Set(Intl.supportedValuesOf('timeZone'));
  zones.add('UTC');
  return [...zones].sort();
}

/**
 * Reference data for the installer form and the config validator
 */
export class InstallerDataService {
  private countries: CountryOption[];
  private keyboards: KeyboardOption[];
  private timezones: string[];
  private options: InstallerOptions;

  constructor(
    optionsFile: string = DEFAULT_OPTIONS_FILE,
    private env: NodeJS.ProcessEnv = process.env
  ) {
    const file = OptionsFileSchema.parse(JSON.parse(fs.readFileSync(optionsFile, 'utf8')));

    const regionNames = new Intl.DisplayNames(['en'], { type: 'region' });
    this.countries = file.countries
      .map((code) => ({ code, name: regionNames.of(code) ?? code }))
      .sort((a, b) => a.name.localeCompare(b.name));
    this.keyboards = file.keyboards;
    this.timezones = runtimeTimezones();

    this.options = {
      countries: new Set(file.countries),
      keyboards: new Set(file.keyboards.map((k) => k.code)),
      timezones: new Set(this.timezones),
    };
  }

  getOptions(): InstallerOptions {
    return this.options;
  }

  /**
   * Country of the host locale (LANG=de_DE.UTF-8 -> DE), if it is a known one
   */
  currentCountry(): string {
    const locale = this.env.LC_ALL || this.env.LANG || '';
    const match = /^[a-z]{2,3}[_-]([A-Z]{2})/.exec(locale);
    if (match && this.options.countries.has(match[1])) {
      return match[1];
    }
    return FALLBACK_COUNTRY;
  }

  currentTimezone(): string {
    const zone = Intl.DateTimeFormat().resolvedOptions().timeZone;
    return this.options.timezones.has(zone) ? zone : FALLBACK_TIMEZONE;
  }

  getInstallerSettings(): InstallerSettings {
    return {
      countries: this.countries,
      keyboards: this.keyboards,
      timezones: this.timezones,
      currentCountry: this.currentCountry(),
      currentTimezone: this.currentTimezone(),
    };
  }
}
