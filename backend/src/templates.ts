import * as nunjucks from 'nunjucks';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Nunjucks environment rooted at the source directory, so templates are
 * addressed as `prompts/<name>.njk` and `llm_templates/<name>.njk`.
 */
export function createTemplateEnvironment(root: string = __dirname): nunjucks.Environment {
  const env = new nunjucks.Environment(new nunjucks.FileSystemLoader(path.resolve(root)), {
    autoescape: false,
    trimBlocks: true,
    lstripBlocks: true
  });
  return env;
}

let sharedEnv: nunjucks.Environment | undefined;

export function getTemplateEnvironment(): nunjucks.Environment {
  if (!sharedEnv) sharedEnv = createTemplateEnvironment();
  return sharedEnv;
}
