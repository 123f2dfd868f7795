/**
 * Extraction Prompt Template Types
 */

/**
 * Prompt pair sent to the primary extraction strategy.
 */
export interface ExtractionTemplate {
  /** Stable identifier, recorded with each extraction */
  name: string;

  /** Bumped whenever the wording changes */
  version: string;

  /** System prompt constraining the reply format */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{company_name}}: The company whose AUM is asked for
   * - {{chunk_text}}: The selected page text
   * - {{not_available}}: The sentinel reply for "no figure"
   */
  userPromptTemplate: string;

  /** Human-readable description of what this template extracts */
  description: string;
}
