/**
 * Prompt templates for asset analysis.
 *
 * Templates use `{{name}}` placeholders filled from artifact metadata and
 * the selected record template. Unknown placeholders are left in place.
 */

import { CaptureArtifact, formatResolution } from '../domain/artifact';

export const DEFAULT_TEMPLATE_FIELDS =
  'name, type, manufacturer, model, serial_number, location, hazards, description';

export const DEFAULT_SYSTEM_PROMPT = `You are a laboratory asset analysis assistant. Analyze the laboratory equipment or item in the image and return structured information for the asset management system.

The most important field is the asset name. Read labels, markings and text on the item itself and be specific (for example "Hydrofluoric Acid" rather than "Acid", or "K-Type Thermocouple" rather than "Thermocouple").

Respond with a single JSON object in two parts:
1. A "summary" object with only "asset_name" and "asset_type" (chemical, equipment, tool, consumable, ...).
2. Then the detailed fields following this template:

{{template}}

Mark information that cannot be read from the image as "unknown". Optionally include a numeric "confidence" between 0 and 1.`;

export const DEFAULT_USER_PROMPT =
  'Analyze the laboratory item in this image (artifact {{artifactId}}, captured by {{deviceId}} at {{capturedAt}}, {{resolution}}). ' +
  'Give the summary section first, then the detailed fields.';

export interface PromptVariables {
  artifactId: string;
  deviceId: string;
  capturedAt: string;
  resolution: string;
  template: string;
}

export function promptVariables(artifact: CaptureArtifact, templateText?: string): PromptVariables {
  return {
    artifactId: artifact.id,
    deviceId: artifact.deviceId,
    capturedAt: artifact.capturedAt,
    resolution: formatResolution(artifact.resolution),
    template: templateText?.trim() ? templateText.trim() : DEFAULT_TEMPLATE_FIELDS,
  };
}

export function renderPrompt(template: string, variables: PromptVariables): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (match, name: string) => {
    switch (name) {
      case 'artifactId':
      case 'deviceId':
      case 'capturedAt':
      case 'resolution':
      case 'template':
        return variables[name];
      default:
        return match;
    }
  });
}

const HTML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' ',
};

/** Plain text of an HTML fragment; block boundaries become newlines. */
export function stripHtml(html: string): string {
  return html
    .replace(/<\s*(br|\/p|\/div|\/h[1-6]|\/li|\/tr)\s*\/?>/gi, '\n')
    .replace(/<[^>]*>/g, '')
    .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
    .split('\n')
    .map((line) => line.replace(/[ \t]+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

export interface BuiltPrompts {
  system: string;
  user: string;
}

export function buildPrompts(
  artifact: CaptureArtifact,
  options: { promptTemplate?: string; templateText?: string; additionalPrompt?: string } = {},
): BuiltPrompts {
  const variables = promptVariables(artifact, options.templateText);
  const systemTemplate = options.promptTemplate?.trim() ? options.promptTemplate : DEFAULT_SYSTEM_PROMPT;
  let user = renderPrompt(DEFAULT_USER_PROMPT, variables);
  if (options.additionalPrompt?.trim()) {
    user += `\n${options.additionalPrompt.trim()}`;
  }
  return { system: renderPrompt(systemTemplate, variables), user };
}
