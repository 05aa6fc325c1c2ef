/** Replace every `{key}` placeholder literally. Unknown placeholders are left as-is. */
export const fillTemplate = (template: string, values: Record<string, string>): string =>
  Object.entries(values).reduce(
    (text, [key, value]) => text.split(`{${key}}`).join(value),
    template,
  );

export const VARIANT_CONVERSION_TEMPLATE = `{instructions}

Text to rewrite:
{text}`;

export const REFINEMENT_TEMPLATE = `This is a formal document conversion task.

[Original Text]
{originalText}

[Primary Conversion Result]
{primaryOutput}

[Task Instructions]
{instructions}

Refine the primary conversion result into a natural, polished formal document while keeping the original intent. Refer to both the original text and the primary conversion result.

- Preserve the core meaning and context of the original text
- Keep the formal tone of the primary conversion but fix anything that reads unnaturally
- Restore any information the primary conversion dropped

Return only the refined text.`;

export const RAG_ANSWER_TEMPLATE = `Please answer the question based on the following document content.

Document:
{context}

Question: {question}

Answer:`;

export const GRAMMAR_QUERY_TEMPLATE =
  'Please analyze the grammar, spelling, and expression of the following text and provide improvement suggestions: {text}';

export const EXPRESSION_QUERY_TEMPLATE =
  'Please change the following text to better expressions in {contextType} context: {text}';
