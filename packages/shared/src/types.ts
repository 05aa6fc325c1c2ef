// Style traits tracked per user (1-10 scale)
export type StyleTrait = 'formality' | 'friendliness' | 'emotion' | 'directness';

export type StyleLevels = Record<StyleTrait, number>;

// The three tone renderings produced for every conversion
export type StyleVariant = 'direct' | 'gentle' | 'neutral';

export const STYLE_VARIANTS: readonly StyleVariant[] = ['direct', 'gentle', 'neutral'];

// Open set of context labels; the well-known ones get tailored descriptions
export type ContextLabel = 'business' | 'report' | 'personal' | 'casual' | 'email' | 'academic' | (string & {});

export type NegativePreferenceLevel = 'strict' | 'moderate' | 'lenient';

export type NegativePreferenceKey =
  | 'avoidFloweryLanguage'
  | 'avoidRepetitiveWords'
  | 'commaUsageStyle'
  | 'contentOverFormat'
  | 'bulletPointUsage'
  | 'emoticonUsage';

export type NegativePreferences = Partial<Record<NegativePreferenceKey, NegativePreferenceLevel>> & {
  customNegativePrompts?: string[];
};

export interface StyleProfile {
  userId?: string;
  base?: Partial<StyleLevels>;
  // Session values win over base values when present
  session?: Partial<StyleLevels>;
  negativePreferences?: NegativePreferences;
  formalDocumentMode?: boolean;
}

// Routing
export type RoutingReason = 'user_explicit_request' | 'auto_condition' | 'condition_not_met';

export interface RoutingDecision {
  escalate: boolean;
  reason: RoutingReason;
}

export type ConversionMethod = 'lora_gpt' | 'gpt_only' | 'none' | 'error';

export interface FormalConversionResult {
  success: boolean;
  convertedText: string;
  primaryOutput: string | null;
  method: ConversionMethod;
  reason: RoutingReason;
  forced: boolean;
  timestamp: string;
  degradations: string[];
  error?: string;
}

// Retrieval
export interface RetrievedPassage {
  source: string;
  content: string;
  rank: number;
}

export interface SourceCitation {
  rank: number;
  source: string;
  content: string;
}

export interface ConversionMetadata {
  modelUsed: string;
  timestamp: string;
  context?: string;
  documentsRetrieved?: number;
  analysisType?: 'grammar_check' | 'expression_improvement';
  originalText?: string;
}

export interface ConversionResult {
  success: boolean;
  convertedTexts: Partial<Record<StyleVariant, string>>;
  answer?: string;
  sources: SourceCitation[];
  ragContext?: string;
  metadata: ConversionMetadata;
  error?: string;
}

// Feedback
export type FeedbackProcessingMethod = 'advanced' | 'basic' | 'none' | 'error';

export interface FeedbackRecord {
  userId: string;
  selectedVariant: StyleVariant;
  rating: number;
  feedbackText: string;
}

export interface FeedbackOutcome {
  success: boolean;
  updatedProfile: StyleProfile;
  styleAdjustments: Partial<Record<StyleTrait, number>>;
  advancedLearning: boolean;
  feedbackProcessed: string;
  processingMethod: FeedbackProcessingMethod;
  error?: string;
}

export interface FeedbackStats {
  userId: string;
  totalFeedback: number;
  averageRating: number;
  variantCounts: Record<StyleVariant, number>;
  lastFeedbackAt: string | null;
}

// API payloads (flat camelCase wire shape)
export interface UserProfilePayload {
  userId?: string;
  baseFormalityLevel?: number;
  baseFriendlinessLevel?: number;
  baseEmotionLevel?: number;
  baseDirectnessLevel?: number;
  sessionFormalityLevel?: number;
  sessionFriendlinessLevel?: number;
  sessionEmotionLevel?: number;
  sessionDirectnessLevel?: number;
  negativePreferences?: NegativePreferences;
  formalDocumentMode?: boolean;
}

export interface DocumentIndexStatus {
  ready: boolean;
  count: number;
}

export interface RagStatusResponse {
  rag_status: 'ready' | 'not_ready';
  doc_count: number;
  services_available: boolean;
}

export interface DocumentIngestResponse {
  success: boolean;
  documents_processed: number;
  chunks_stored: number;
  message: string;
  error?: string;
}

export interface HealthResponse {
  status: 'ok';
  service: string;
  openai_available: boolean;
  specialized_endpoint_reachable: boolean;
  document_index: DocumentIndexStatus & { available: boolean };
  preference_store_available: boolean;
  timestamp: string;
}
