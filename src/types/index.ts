// ============================================================
// Content Types
// ============================================================

/** エンゲージメント数（すべて非負整数） */
export interface Engagement {
  replies: number
  boosts: number
  favorites: number
}

/** 注入元 */
export type InjectionSource = 'recommendation' | 'cold_start' | (string & {})

/** 注入アイテムに付与するメタデータ */
export interface InjectionMetadata {
  /** 注入元 */
  source: InjectionSource
  /** 使用した戦略名 */
  strategy?: StrategyType
  /** 表示用の説明文 */
  explanation: string
  /** スコア（個人化無効時は付与しない） */
  score?: number
}

/** タイムラインのアイテム */
export interface Item {
  /** アイテムID（不透明な文字列） */
  id: string
  /** 投稿者ID */
  authorId: string
  /** 作成日時（epoch ms） */
  createdAt: number
  /** タグ（順序なし・重複なし） */
  tags: string[]
  /** エンゲージメント */
  engagement: Engagement
  /** スコア（コアが付与） */
  score?: number
  /** 注入フラグ（実アイテムは false / 未設定） */
  injected?: boolean
  /** 注入メタデータ */
  injectionMetadata?: InjectionMetadata
}

// ============================================================
// User Types
// ============================================================

/** 集計済みエンゲージメント情報 */
export interface EngagementAggregates {
  /** 履歴上のインタラクション数 */
  totalInteractions: number
  /** 母集団平均の著者親和度（DEGRADED 時に使用） */
  populationAuthorAffinity?: number
  /** エンゲージメント項が飽和する基準値 */
  engagementSaturation?: number
}

/** ユーザーのシグナルプロファイル（外部で算出、コアは読むだけ） */
export interface SignalProfile {
  /** ユーザーキー（匿名化ID） */
  userKey: string
  /** 著者ID → 親和度 */
  authorAffinity: Record<string, number>
  /** 現在時刻（epoch ms） */
  nowTs: number
  /** 集計値 */
  aggregates: EngagementAggregates
}

/** トラッキング同意レベル */
export type TrackingLevel = 'full' | 'limited' | 'none'

/** 個人化モード */
export type PersonalizationMode = 'FULL' | 'DEGRADED' | 'DISABLED'

// ============================================================
// Scoring Types
// ============================================================

/** スコア重み */
export interface WeightConfig {
  /** Author affinity weight */
  author: number
  /** Engagement weight */
  engagement: number
  /** Recency weight */
  recency: number
  /** 新しさの減衰窓（日） */
  decayDays: number
}

export interface ScoreBreakdown {
  author: number
  engagement: number
  recency: number
  /** 正規化後の重み */
  weights: WeightConfig
  finalScore: number
}

export const DEFAULT_WEIGHTS: WeightConfig = {
  author: 0.4,
  engagement: 0.3,
  recency: 0.3,
  decayDays: 7
}

// ============================================================
// Injection Strategy Types
// ============================================================

export const STRATEGY_TYPES = ['uniform', 'after_n', 'first_only', 'tag_match'] as const

export type StrategyType = (typeof STRATEGY_TYPES)[number]

/** 注入戦略（正規化済み） */
export interface InjectionStrategy {
  type: StrategyType
  /** 最大注入数 デフォルト: 注入候補数 */
  maxInjections: number
  /** after_n の間隔 デフォルト: 3 */
  n: number
  /** 注入候補をシャッフルするか */
  shuffleInjectable: boolean
  /** 注入に必要な最小間隔（分） デフォルト: 0 */
  minGapMinutes: number
  /** シャッフル用シード（任意） */
  seed?: string
}

/** 呼び出し側から渡される戦略（type 以外は省略可） */
export interface InjectionStrategyInput {
  type: string
  maxInjections?: number
  n?: number
  shuffleInjectable?: boolean
  minGapMinutes?: number
  seed?: string
}

/** マージ結果のレポート */
export interface MergeReport {
  strategy: StrategyType
  /** 注入予算 k */
  requested: number
  /** 実際に注入した数 */
  injected: number
  /** min_gap で除外されたギャップ数 */
  skippedByGap: number
}

// ============================================================
// Blend Pipeline Types
// ============================================================

export interface ColdStartRequest {
  /** コールドスタート候補を使うか */
  enabled: boolean
  /** 露出上限 */
  limit: number
}

/** ブレンドリクエスト */
export interface BlendRequest {
  /** 実タイムライン（順不同） */
  realItems: Item[]
  /** 注入候補プール */
  candidatePool: Item[]
  /** トラッキング同意レベル */
  trackingLevel: TrackingLevel
  /** シグナルプロファイル（匿名ユーザーは省略） */
  profile?: SignalProfile
  /** 注入戦略 */
  strategy: InjectionStrategyInput
  /** スコア重み（省略時はデフォルト） */
  weights?: WeightConfig
  /** コールドスタート設定 */
  coldStart?: ColdStartRequest
  /** false の場合は注入しない デフォルト: true */
  inject?: boolean
  /** 個人化に必要な最小インタラクション数 デフォルト: 0 */
  minInteractions?: number
  /** true の場合はモードやプロファイルに関係なくコールドスタートを使う */
  forceColdStart?: boolean
}

export type InjectableSource = 'ranked' | 'cold_start' | 'none'

export interface BlendReport {
  mode: PersonalizationMode
  source: InjectableSource
  merge: MergeReport | null
}

export interface BlendResponse {
  items: Item[]
  report: BlendReport
}

// ============================================================
// Reason Codes
// ============================================================

export type ReasonCode =
  | 'AUTHOR_AFFINITY'
  | 'POPULAR'
  | 'RECENT'
  | 'COLD_START'
  | 'TAG_MATCH'

/** 理由コードの説明テンプレート */
export const REASON_DESCRIPTIONS: Record<ReasonCode, string> = {
  AUTHOR_AFFINITY: 'From an author you might like',
  POPULAR: 'Popular with other users',
  RECENT: 'Recently posted',
  COLD_START: 'Popular with the community',
  TAG_MATCH: 'Shares a tag with a post in your timeline'
}

export const DEFAULT_EXPLANATION = 'Suggested content we think you might find interesting'
