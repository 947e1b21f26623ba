#!/usr/bin/env node
import {CronJob} from 'cron';
import {Option} from "prelude-ts";
import {createLogger} from "./logger";
import {ConfigValidator} from "./config-validator";
import {Pipeline} from "./pipeline";
import {Helper} from "./helper";
import {getErrorMessage} from "./errors";

const appName = 'unassigned-report';
const appVersion = '1.0.0';

const commandLine = Helper.parseCommandLine(process.argv.slice(2));
const configPath = commandLine.options.get('config').filter(x => x.length > 0).getOrElse('./config.json');
const ccList = Helper.splitAddressList(commandLine.options.get('cc').getOrUndefined());

const logger = createLogger();

function displayAppInfo() {
    const rule = '═'.repeat(60);
    logger.info(rule);
    logger.info(`${appName} :: Version ${appVersion}`);
    logger.info('Reports open tracker issues that nobody is assigned to');
    logger.info(rule);
}

function displayUsage() {
    logger.info(`usage: ${appName} report --recipient <address> [--cc <address,address>] [--config <path>]`);
    logger.info(`       ${appName} reportCron [--cc <address,address>] [--config <path>]`);
}

function loadSettings(): unknown {
    try {
        return ConfigValidator.loadSettingsFile(configPath);
    }
    catch (error) {
        logger.error(getErrorMessage(error));
        throw error;
    }
}

// each run loads the settings again; nothing is kept between runs
async function report(recipient: Option<string>) {
    await Pipeline.run(loadSettings(), {recipient: recipient.getOrUndefined(), cc: ccList}, {logger});
}

function scheduleReports() {
    const settings = ConfigValidator.validate(loadSettings(), logger);
    const cronTime = settings.report.cronTime;
    const cronJob = CronJob.from({
        cronTime: cronTime,
        onTick: async function () {
            try {
                await report(Option.none());
            }
            catch (error) {
                logger.warn(`Scheduled report failed (${getErrorMessage(error)}), waiting for the next run`);
            }
        },
        start: false,
        runOnInit: true
    });
    logger.info(`Setting up cron job ${cronTime}, reports go to ${settings.mail.defaultRecipient}`);
    cronJob.start();
}

displayAppInfo();

const command = commandLine.command.getOrElse('');

if (command === 'report') {
    const recipient = commandLine.options.get('recipient').filter(x => x.trim().length > 0);
    if (recipient.isNone()) {
        logger.error('Missing required option --recipient');
        displayUsage();
        process.exitCode = 1;
    }
    else {
        report(recipient.map(x => x.trim())).catch(error => {
            // the failing stage has logged the details already
            logger.error(`Report run failed: ${getErrorMessage(error)}`);
            process.exitCode = 1;
        });
    }
}
else if (command === 'reportCron') {
    try {
        scheduleReports();
    }
    catch (error) {
        logger.error(`Could not schedule reports: ${getErrorMessage(error)}`);
        process.exitCode = 1;
    }
}
else {
    logger.error(`Unknown command '${command}'`);
    displayUsage();
    process.exitCode = 1;
}
