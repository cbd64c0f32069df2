import type Database from 'better-sqlite3'

export function runDealAuditMigration(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS deal_stage_history (
      id TEXT PRIMARY KEY,
      deal_id TEXT NOT NULL,
      from_stage TEXT,
      to_stage TEXT NOT NULL,
      changed_at TEXT NOT NULL,
      note TEXT,
      actor_id TEXT,
      FOREIGN KEY (deal_id) REFERENCES deals(id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_deal_stage_history_deal
      ON deal_stage_history(deal_id, changed_at);
    CREATE INDEX IF NOT EXISTS idx_deal_stage_history_to_stage
      ON deal_stage_history(to_stage, changed_at);

    CREATE TABLE IF NOT EXISTS activities (
      id TEXT PRIMARY KEY,
      entity_type TEXT NOT NULL,
      entity_id TEXT NOT NULL,
      kind TEXT NOT NULL,
      subject TEXT,
      body_md TEXT,
      meta_json TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL,
      created_by TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_activities_entity
      ON activities(entity_type, entity_id, created_at);
  `)
}
