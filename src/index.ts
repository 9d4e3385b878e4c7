#!/usr/bin/env node
import logger from 'node-color-log';
import promptSync from 'prompt-sync';
import config from './config';
import { typeChoices } from './constants/prompts';
import { runFeedSync } from './lib/actions';
import { errorMessage } from './lib/errors';

const prompt = promptSync({ sigint: true });

async function main() {
  logger.setLevel(config.LOG_LEVEL);

  // Scheduled runs go straight to the sync; --menu is for running by hand
  if (!process.argv.includes('--menu')) {
    return runFeedSync();
  }

  const chosenActionType = actionTypePrompt();

  if (!chosenActionType) {
    return false;
  }

  return chosenActionType.action();
}

function actionTypePrompt() {
  logger.color('blue').bold().log('What do you want to do?');
  typeChoices.forEach(({ label }, index) => {
    logger.log(`${index + 1} : ${label}`);
  });

  const input = parseInt(prompt('Enter number of choice: '));

  const chosenAction = typeChoices[input - 1];

  if (Number.isNaN(input) || !chosenAction) {
    logger.error('Invalid input. Please try again.');
    return;
  }

  logger.info(`You chose: ${chosenAction.label}`);

  return chosenAction;
}

main()
  .then((succeeded) => {
    process.exitCode = succeeded ? 0 : 1;
  })
  .catch((error: unknown) => {
    logger.error(errorMessage(error));
    process.exitCode = 1;
  });
