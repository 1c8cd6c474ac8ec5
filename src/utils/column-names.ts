/**
 * Column name normalization helpers shared by the profiler, matcher and description catalogue
 */

/**
 * Normalize a column name to lower snake_case
 *
 * @example
 * normalizeColumnName("AccountNumber")   // "account_number"
 * normalizeColumnName(" Txn-Date ")      // "txn_date"
 * normalizeColumnName("customer  name")  // "customer_name"
 */
export function normalizeColumnName(name: string): string {
  return name
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * Split a column name into lowercase keyword fragments
 *
 * @example
 * extractKeywords("custAccountNo") // ["cust", "account", "no"]
 */
export function extractKeywords(name: string): string[] {
  return normalizeColumnName(name)
    .split("_")
    .filter((part) => part.length > 0);
}

/**
 * Human label for a snake_case key: "account_number" → "Account Number"
 */
export function titleCase(key: string): string {
  return key
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}
