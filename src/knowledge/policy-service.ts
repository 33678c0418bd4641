import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv, { JSONSchemaType } from 'ajv';
import { PolicyLookupResult, PolicyRoute, PolicySectionTable } from './types';
import { normalizeHeading, parseSections } from './section-parser';
import { logger } from '../observability/logger';

// Resolve from project root (2 levels up from dist/knowledge/ or src/knowledge/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const KNOWLEDGE_DIR = path.resolve(PROJECT_ROOT, 'knowledge');

const POLICY_DOCUMENT_FILE = 'policies.md';
const POLICY_ROUTES_FILE = 'policy-routes.yaml';

const ROUTES_SCHEMA: JSONSchemaType<PolicyRoute[]> = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      id: { type: 'string' },
      keywords: { type: 'array', items: { type: 'string' }, minItems: 1 },
      section: { type: 'string', nullable: true },
      answer: { type: 'string', nullable: true },
      fallback: { type: 'string', nullable: true },
    },
    required: ['id', 'keywords'],
    additionalProperties: false,
  },
};

const validateRoutes = new Ajv({ allErrors: true }).compile(ROUTES_SCHEMA);

/**
 * Keyword-routed lookup over the policy knowledge base.
 *
 * Two tables are built once: the ordered route list (keywords → section or
 * fixed answer) and the section table parsed from the document. Routing only
 * ever reads the section table, so the document source can change without
 * touching the routes.
 */
export class PolicyService {
  private readonly routes: PolicyRoute[];
  private readonly sections: PolicySectionTable;
  private log = logger.child({ component: 'policy-service' });

  constructor(document: string, routes: PolicyRoute[]) {
    this.sections = parseSections(document);
    this.routes = routes.map((route) => ({
      ...route,
      keywords: route.keywords.map((k) => k.toLowerCase()),
    }));
    this.log.info(
      { sectionCount: this.sections.size, routeCount: this.routes.length },
      'Policy knowledge base loaded',
    );
  }

  /** Load policies.md and policy-routes.yaml from a knowledge directory. */
  static fromDirectory(dir: string = KNOWLEDGE_DIR): PolicyService {
    const document = fs.readFileSync(path.join(dir, POLICY_DOCUMENT_FILE), 'utf-8');
    const rawRoutes: unknown = yaml.load(fs.readFileSync(path.join(dir, POLICY_ROUTES_FILE), 'utf-8'));
    if (!validateRoutes(rawRoutes)) {
      const errors = validateRoutes.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
      throw new Error(`Invalid policy routes in ${POLICY_ROUTES_FILE}: ${errors}`);
    }
    return new PolicyService(document, rawRoutes);
  }

  /**
   * Find the policy text for a free-text topic.
   * The first route with a keyword contained in the lowercased topic decides the
   * outcome; if that route yields nothing, the lookup is not found.
   */
  lookup(topic: string): PolicyLookupResult {
    const topicLower = topic.toLowerCase();
    const route = this.routes.find((r) => r.keywords.some((k) => topicLower.includes(k)));

    if (route) {
      const text = this.resolve(route);
      if (text) {
        return { found: true, routeId: route.id, text };
      }
    }

    this.log.warn({ topic, routeId: route?.id }, 'No matching policy section found');
    return {
      found: false,
      message: `Error: No policy information found for the topic '${topic}'.`,
    };
  }

  /** Section headings known to the service (lowercased) */
  getSectionNames(): string[] {
    return Array.from(this.sections.keys());
  }

  private resolve(route: PolicyRoute): string | undefined {
    if (route.answer !== undefined) return route.answer;
    if (route.section !== undefined) {
      const body = this.sections.get(normalizeHeading(route.section));
      if (body) return body;
    }
    return route.fallback;
  }
}
