/**
 * tagged-memory categorize "text" - preview the category a note would get
 */

import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { classify, scoreCategories } from '../../memory/classifier.js';
import { formatCategory, formatScores, info } from '../ui.js';

export function createCategorizeCommand() {
  return new Command('categorize')
    .argument('<text...>', 'Text to classify')
    .option('--json', 'Print the result as JSON')
    .description('Show which category a note would be saved under')
    .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.cyan('tagged-memory categorize')} "Reunião com o cliente amanhã"
  ${chalk.cyan('tagged-memory categorize')} ${chalk.gray('--json')} "Corrigir o bug do servidor"
`)
    .action((words, options) => {
      const text = words.join(' ');
      const category = classify(text);
      const scores = scoreCategories(text);

      if (options.json) {
        console.log(JSON.stringify({ category, scores }));
        return;
      }

      console.log(`${formatCategory(category)} ${chalk.white(text)}`);
      console.log(`   ${formatScores(scores)}`);
      if (category === 'general') {
        console.log(info('No keywords matched, so this falls back to general.'));
      }
    });
}
