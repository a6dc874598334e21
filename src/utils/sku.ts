/**
 * SKU = first four letters of the category (upper case), a slug of the
 * first three characters of the product name, and the creation date:
 * `ELEC-lap-2024-05-01`.
 */
export const slugify = (value: string): string =>
  value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

export const generateSku = (name: string, categoryName: string, date: Date = new Date()): string => {
  const base = slugify(name.slice(0, 3)) || 'item';
  const categoryInitial = categoryName.slice(0, 4).toUpperCase();
  const day = date.toISOString().slice(0, 10);

  return `${categoryInitial}-${base}-${day}`;
};

/**
 * Appends -2, -3, ... until `isTaken` reports the SKU as free.
 */
export const generateUniqueSku = async (
  name: string,
  categoryName: string,
  isTaken: (sku: string) => Promise<boolean>,
  date: Date = new Date()
): Promise<string> => {
  const base = generateSku(name, categoryName, date);
  let candidate = base;
  let suffix = 1;

  while (await isTaken(candidate)) {
    suffix += 1;
    candidate = `${base}-${suffix}`;
  }

  return candidate;
};
