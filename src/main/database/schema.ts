// Raw database row types (snake_case matching SQLite columns)

export interface SettingsRow {
  key: string
  value: string
  updated_at: string
}

export interface CompanyRow {
  id: string
  name: string
  website: string | null
  phone: string | null
  created_at: string
  updated_at: string
}

export interface ContactRow {
  id: string
  email: string
  first_name: string | null
  last_name: string | null
  phone: string | null
  company_id: string | null
  created_at: string
  updated_at: string
}

export interface DealRow {
  id: string
  title: string
  amount_cents: number | null
  currency: string | null
  stage: string
  close_date: string | null
  company_id: string
  assigned_user_id: string | null
  created_by: string | null
  updated_by: string | null
  created_at: string
  updated_at: string
}

export interface StageMetaRow {
  key: string
  display_name: string
  sort_order: number
  probability: number
  is_won: number
  is_lost: number
}

export interface DealStageHistoryRow {
  id: string
  deal_id: string
  from_stage: string | null
  to_stage: string
  changed_at: string
  note: string | null
  actor_id: string | null
}

export interface ActivityRow {
  id: string
  entity_type: string
  entity_id: string
  kind: string
  subject: string | null
  body_md: string | null
  meta_json: string
  created_at: string
  created_by: string | null
}
