import type Database from 'better-sqlite3'
import type { DealStageKey } from '../../../shared/types/pipeline'

const MIGRATION_KEY = 'migration_003_stage_meta_seed_v1'

interface StageSeed {
  key: DealStageKey
  displayName: string
  sortOrder: number
  probability: number
  isWon: boolean
  isLost: boolean
}

const DEFAULT_STAGES: StageSeed[] = [
  { key: 'new', displayName: 'New', sortOrder: 10, probability: 10, isWon: false, isLost: false },
  { key: 'qualify', displayName: 'Qualify', sortOrder: 20, probability: 25, isWon: false, isLost: false },
  { key: 'proposal', displayName: 'Proposal', sortOrder: 30, probability: 50, isWon: false, isLost: false },
  { key: 'negotiate', displayName: 'Negotiate', sortOrder: 40, probability: 70, isWon: false, isLost: false },
  { key: 'won', displayName: 'Won', sortOrder: 90, probability: 100, isWon: true, isLost: false },
  { key: 'lost', displayName: 'Lost', sortOrder: 95, probability: 0, isWon: false, isLost: true }
]

export function runStageMetaMigration(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS stage_meta (
      key TEXT PRIMARY KEY,
      display_name TEXT NOT NULL,
      sort_order INTEGER NOT NULL UNIQUE,
      probability INTEGER NOT NULL CHECK (probability BETWEEN 0 AND 100),
      is_won INTEGER NOT NULL DEFAULT 0,
      is_lost INTEGER NOT NULL DEFAULT 0
    );
    CREATE INDEX IF NOT EXISTS idx_stage_meta_order ON stage_meta(sort_order);
  `)

  // deals.stage must always name a catalog row
  db.exec(`
    CREATE TRIGGER IF NOT EXISTS deals_stage_known_insert
    BEFORE INSERT ON deals
    WHEN NOT EXISTS (SELECT 1 FROM stage_meta WHERE key = NEW.stage)
    BEGIN
      SELECT RAISE(ABORT, 'Deal stage is not in the stage catalog');
    END;

    CREATE TRIGGER IF NOT EXISTS deals_stage_known_update
    BEFORE UPDATE OF stage ON deals
    WHEN NOT EXISTS (SELECT 1 FROM stage_meta WHERE key = NEW.stage)
    BEGIN
      SELECT RAISE(ABORT, 'Deal stage is not in the stage catalog');
    END;

    CREATE TRIGGER IF NOT EXISTS stage_meta_in_use_delete
    BEFORE DELETE ON stage_meta
    WHEN EXISTS (SELECT 1 FROM deals WHERE stage = OLD.key)
    BEGIN
      SELECT RAISE(ABORT, 'Stage still has deals');
    END;
  `)

  // Seeded once; later edits (or a deliberately emptied catalog) are left alone.
  const alreadyRan = db
    .prepare('SELECT value FROM settings WHERE key = ?')
    .get(MIGRATION_KEY) as { value: string } | undefined
  if (alreadyRan?.value === '1') return

  const insertStage = db.prepare(`
    INSERT INTO stage_meta (key, display_name, sort_order, probability, is_won, is_lost)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT(key) DO NOTHING
  `)

  const tx = db.transaction((stages: StageSeed[]) => {
    for (const stage of stages) {
      insertStage.run(
        stage.key,
        stage.displayName,
        stage.sortOrder,
        stage.probability,
        stage.isWon ? 1 : 0,
        stage.isLost ? 1 : 0
      )
    }
    db.prepare(`
      INSERT INTO settings (key, value, updated_at)
      VALUES (?, '1', datetime('now'))
      ON CONFLICT(key) DO UPDATE SET value = '1', updated_at = datetime('now')
    `).run(MIGRATION_KEY)
  })

  tx(DEFAULT_STAGES)
}
