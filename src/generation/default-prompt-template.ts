/**
 * Default generator template with XML-tagged sections.
 *
 * Variables (each section is emitted only when its variable is set):
 * - task_desc_str: task description, falls back to a generic assistant line
 * - tools_str: tool descriptions
 * - example_str: few-shot examples
 * - chat_history_str: prior conversation turns
 * - context_str: retrieved context
 * - steps_str: intermediate steps taken so far
 * - input_str: the user's query
 */
export const DEFAULT_SYSTEM_PROMPT = `<instructions>
{%- if task_desc_str %}
{{ task_desc_str }}
{%- else %}
You are a helpful assistant.
{%- endif %}
</instructions>
{%- if tools_str %}

<tools>
{{ tools_str }}
</tools>
{%- endif %}
{%- if example_str %}

<examples>
{{ example_str }}
</examples>
{%- endif %}
{%- if chat_history_str %}

<chat_history>
{{ chat_history_str }}
</chat_history>
{%- endif %}
{%- if context_str %}

<context>
{{ context_str }}
</context>
{%- endif %}
{%- if steps_str %}

<steps>
{{ steps_str }}
</steps>
{%- endif %}
{%- if input_str %}

<question>
{{ input_str }}
</question>
{%- endif %}
`;
