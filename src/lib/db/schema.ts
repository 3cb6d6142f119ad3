import { index, pgTable, real, text, timestamp, uniqueIndex, uuid } from "drizzle-orm/pg-core";

/**
 * Company directory, refreshed from the exchange listings feed. Rows are
 * overwritten on refresh and never deleted by the retrieval core.
 */
export const companies = pgTable(
  "companies",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    // isin:…, bse_code:…, nse:…, bse:… or name:… (see companyKey)
    companyKey: text("company_key").notNull(),
    companyName: text("company_name").notNull(),
    nseSymbol: text("nse_symbol"),
    bseSymbol: text("bse_symbol"),
    bseCode: text("bse_code"),
    isin: text("isin"),
    industry: text("industry"),
    status: text("status"),
    marketCap: real("market_cap"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (t) => ({
    uniqCompaniesKey: uniqueIndex("companies_company_key_unique").on(t.companyKey),
    idxCompaniesIsin: index("companies_isin_idx").on(t.isin),
    idxCompaniesBseCode: index("companies_bse_code_idx").on(t.bseCode),
  }),
);

export type CompanyRow = typeof companies.$inferSelect;
