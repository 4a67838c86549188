/**
 * Templates
 *
 * Nunjucks environment over a template directory. Build one per run and
 * share it; nothing in it changes after construction.
 */

import nunjucks from 'nunjucks';
import type { Template } from 'nunjucks';
import type { TemplateEngine, TemplateVariables } from './types.js';
import { PageError, describeError } from './errors.js';

/** Message nunjucks throws when no loader has the template */
const NOT_FOUND_MESSAGE = /^template not found/i;

export function createTemplateEngine(templateDir: string): TemplateEngine {
  const environment = new nunjucks.Environment(new nunjucks.FileSystemLoader(templateDir), {
    autoescape: true,
  });

  return {
    templateDir,

    render(name: string, variables: TemplateVariables): string {
      let template: Template;
      try {
        template = environment.getTemplate(name);
      } catch (error) {
        if (NOT_FOUND_MESSAGE.test(describeError(error))) {
          throw new PageError({ code: 'TEMPLATE_NOT_FOUND', template: name, templateDir });
        }
        throw new PageError(
          { code: 'TEMPLATE_RENDER_ERROR', template: name, reason: describeError(error) },
          { cause: error }
        );
      }

      try {
        return template.render(variables);
      } catch (error) {
        throw new PageError(
          { code: 'TEMPLATE_RENDER_ERROR', template: name, reason: describeError(error) },
          { cause: error }
        );
      }
    },
  };
}
