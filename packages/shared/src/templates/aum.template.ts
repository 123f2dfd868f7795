/**
 * AUM Extraction Template
 *
 * The reply must be a bare figure ("R$ 2,3 bi") or the sentinel, so it can
 * go straight into the monetary value parser.
 */

import type { ExtractionTemplate } from './types';

export const AUM_TEMPLATE: ExtractionTemplate = {
  name: 'aum',
  version: '2.0.0',
  description: 'Patrimônio sob gestão (assets under management) announced by a company',

  systemPrompt:
    'Você é um assistente especializado em extrair informações financeiras de textos. ' +
    'Responda APENAS com o valor solicitado.',

  userPromptTemplate: `Analise o texto abaixo e responda APENAS com o patrimônio sob gestão (AUM) anunciado por {{company_name}}.

Responda SOMENTE com o número e a unidade (ex: R$ 2,3 bi) ou {{not_available}}.

Texto para análise:
{{chunk_text}}

Resposta:`,
};
