type TechnologySignal = {
  label: string;
  pattern: RegExp;
};

/**
 * Construction and enterprise software names worth surfacing from company pages.
 */
const technologySignals: TechnologySignal[] = [
  { label: "Procore", pattern: /\bprocore\b/i },
  { label: "Primavera P6", pattern: /\b(primavera|p6)\b/i },
  { label: "Autodesk", pattern: /\b(autodesk|revit|autocad|bim 360)\b/i },
  { label: "Oracle", pattern: /\boracle\b/i },
  { label: "SAP", pattern: /\bSAP\b/ },
  { label: "Salesforce", pattern: /\bsalesforce\b/i },
  { label: "Microsoft", pattern: /\b(microsoft|dynamics 365|sharepoint)\b/i },
  { label: "Bluebeam", pattern: /\bbluebeam\b/i },
  { label: "Trimble", pattern: /\b(trimble|viewpoint)\b/i },
  { label: "AI", pattern: /\b(AI|artificial intelligence|machine learning)\b/ },
  { label: "Cloud", pattern: /\b(cloud|saas|aws|azure)\b/i },
  { label: "Drones", pattern: /\b(drone|uav)s?\b/i },
];

export const detectTechnologies = (text: string): string[] =>
  technologySignals
    .filter((signal) => signal.pattern.test(text))
    .map((signal) => signal.label);

export const collapseWhitespace = (text: string): string =>
  text.replace(/\s+/g, " ").trim();

/**
 * Cuts at a word boundary when one exists in the second half of the window.
 */
export const excerpt = (text: string, maxChars: number): string => {
  const clean = collapseWhitespace(text);
  if (clean.length <= maxChars) {
    return clean;
  }

  const window = clean.slice(0, maxChars);
  const lastSpace = window.lastIndexOf(" ");
  const cut = lastSpace > maxChars / 2 ? window.slice(0, lastSpace) : window;
  return `${cut}...`;
};

/** Rough token count for cost estimates: four characters per token. */
export const estimateTokens = (text: string): number => Math.ceil(text.length / 4);
