import type Database from 'better-sqlite3'

// Each searchable table gets an FTS5 index keyed by the source row's id (an
// UNINDEXED column); triggers keep it current inside the writing transaction.
export function runFtsMigration(db: Database.Database): void {
  db.exec(`
    CREATE VIRTUAL TABLE IF NOT EXISTS companies_fts USING fts5(
      company_id UNINDEXED,
      name,
      website,
      tokenize='unicode61 remove_diacritics 2'
    );

    CREATE TRIGGER IF NOT EXISTS companies_fts_ai AFTER INSERT ON companies BEGIN
      INSERT INTO companies_fts (company_id, name, website)
      VALUES (new.id, new.name, COALESCE(new.website, ''));
    END;

    CREATE TRIGGER IF NOT EXISTS companies_fts_ad AFTER DELETE ON companies BEGIN
      DELETE FROM companies_fts WHERE company_id = old.id;
    END;

    CREATE TRIGGER IF NOT EXISTS companies_fts_au AFTER UPDATE OF name, website ON companies BEGIN
      DELETE FROM companies_fts WHERE company_id = old.id;
      INSERT INTO companies_fts (company_id, name, website)
      VALUES (new.id, new.name, COALESCE(new.website, ''));
    END;

    CREATE VIRTUAL TABLE IF NOT EXISTS contacts_fts USING fts5(
      contact_id UNINDEXED,
      email,
      first_name,
      last_name,
      phone,
      tokenize='unicode61 remove_diacritics 2'
    );

    CREATE TRIGGER IF NOT EXISTS contacts_fts_ai AFTER INSERT ON contacts BEGIN
      INSERT INTO contacts_fts (contact_id, email, first_name, last_name, phone)
      VALUES (
        new.id, new.email,
        COALESCE(new.first_name, ''), COALESCE(new.last_name, ''), COALESCE(new.phone, '')
      );
    END;

    CREATE TRIGGER IF NOT EXISTS contacts_fts_ad AFTER DELETE ON contacts BEGIN
      DELETE FROM contacts_fts WHERE contact_id = old.id;
    END;

    CREATE TRIGGER IF NOT EXISTS contacts_fts_au
    AFTER UPDATE OF email, first_name, last_name, phone ON contacts BEGIN
      DELETE FROM contacts_fts WHERE contact_id = old.id;
      INSERT INTO contacts_fts (contact_id, email, first_name, last_name, phone)
      VALUES (
        new.id, new.email,
        COALESCE(new.first_name, ''), COALESCE(new.last_name, ''), COALESCE(new.phone, '')
      );
    END;

    CREATE VIRTUAL TABLE IF NOT EXISTS deals_fts USING fts5(
      deal_id UNINDEXED,
      title,
      tokenize='unicode61 remove_diacritics 2'
    );

    CREATE TRIGGER IF NOT EXISTS deals_fts_ai AFTER INSERT ON deals BEGIN
      INSERT INTO deals_fts (deal_id, title) VALUES (new.id, new.title);
    END;

    CREATE TRIGGER IF NOT EXISTS deals_fts_ad AFTER DELETE ON deals BEGIN
      DELETE FROM deals_fts WHERE deal_id = old.id;
    END;

    CREATE TRIGGER IF NOT EXISTS deals_fts_au AFTER UPDATE OF title ON deals BEGIN
      DELETE FROM deals_fts WHERE deal_id = old.id;
      INSERT INTO deals_fts (deal_id, title) VALUES (new.id, new.title);
    END;
  `)
}
