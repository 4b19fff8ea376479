const MAC_FILTER_LINE = /^[ \t]*filter\.ID_NET_NAME_MAC[ \t]*=[ \t]*"[^"\n]*"[ \t]*$/m;
const DISK_LIST_LINE = /^[ \t]*disk-list[ \t]*=[ \t]*\[[^\]\n]*\][ \t]*$/m;

const MAC_PATTERN = /^(?:[0-9A-Fa-f]{2}:){5}[0-9A-Fa-f]{2}$/;

export interface AnswerPatch {
  mac?: string;
  disk?: string;
}

export interface PatchResult {
  contents: string;
  macPatched: boolean;
  diskPatched: boolean;
}

export function isMacAddress(value: string): boolean {
  return MAC_PATTERN.test(value);
}

/**
 * udev's ID_NET_NAME_MAC carries the address as bare lowercase hex
 * (enxaabbccddeeff), so the glob has to as well.
 */
export function macFilterGlob(mac: string): string {
  return `*${mac.replace(/:/g, '').toLowerCase()}`;
}

/**
 * Rewrite the NIC filter and disk list lines of an answer file.
 * Lines that are not present are left alone; nothing else is touched.
 */
export function patchAnswerFile(contents: string, patch: AnswerPatch): PatchResult {
  let result = contents;
  let macPatched = false;
  let diskPatched = false;

  if (patch.mac !== undefined && MAC_FILTER_LINE.test(result)) {
    const line = `filter.ID_NET_NAME_MAC = "${macFilterGlob(patch.mac)}"`;
    result = result.replace(MAC_FILTER_LINE, () => line);
    macPatched = true;
  }
  if (patch.disk !== undefined && DISK_LIST_LINE.test(result)) {
    const line = `disk-list = ["${patch.disk}"]`;
    result = result.replace(DISK_LIST_LINE, () => line);
    diskPatched = true;
  }

  return { contents: result, macPatched, diskPatched };
}
