import type { ProductType } from "@/types";

const listingPatterns: Record<ProductType, RegExp> = {
  image: />[0-9_]*\.JPG/gi,
  ortho: />DMS\w*\.tif</gi,
  dem: />IODMS\w*DEM\.tif/gi,
  lvis: />ILVIS\w+\.TXT/gi,
  atm1: />ILATM1B[0-9_]*\.ATM4\w+\.qi/gi,
  atm2: />ILATM1B[0-9_]*\.ATM\w+\.h5/gi,
};

/**
 * 從 HTML 目錄清單取出指定產品的檔名，依出現順序、去除重複。
 */
export function parseListing(html: string, type: ProductType): string[] {
  const names = new Set<string>();
  for (const match of html.matchAll(listingPatterns[type])) {
    names.add(match[0].replaceAll(/[<>]/g, ""));
  }
  return [...names];
}
