import type { EnumOption } from "./classify.js";

/**
 * Windows GDI character set identifiers, in the order an editor lists them.
 */
export const CHARSET_OPTIONS: readonly EnumOption[] = [
  { label: "ANSI_CHARSET", value: "0" },
  { label: "DEFAULT_CHARSET", value: "1" },
  { label: "SYMBOL_CHARSET", value: "2" },
  { label: "SHIFTJIS_CHARSET", value: "128" },
  { label: "HANGEUL_CHARSET", value: "129" },
  { label: "GB2312_CHARSET", value: "134" },
  { label: "CHINESEBIG5_CHARSET", value: "136" },
  { label: "OEM_CHARSET", value: "255" },
  { label: "JOHAB_CHARSET", value: "130" },
  { label: "HEBREW_CHARSET", value: "177" },
  { label: "ARABIC_CHARSET", value: "178" },
  { label: "GREEK_CHARSET", value: "161" },
  { label: "TURKISH_CHARSET", value: "162" },
  { label: "VIETNAMESE_CHARSET", value: "163" },
  { label: "THAI_CHARSET", value: "222" },
  { label: "EASTEUROPE_CHARSET", value: "238" },
  { label: "RUSSIAN_CHARSET", value: "204" },
  { label: "MAC_CHARSET", value: "77" },
  { label: "BALTIC_CHARSET", value: "186" },
];

export const DARK_THEME_OPTIONS: readonly EnumOption[] = [
  { label: "Lighter", value: "0" },
  { label: "Darker", value: "1" },
  { label: "Custom", value: "2" },
];
