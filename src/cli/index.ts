#!/usr/bin/env node
import { Command } from 'commander';
import dotenv from 'dotenv';
import yaml from 'yaml';
import { ConfigManager } from '../config/ConfigManager';
import { GatewayServer } from '../gateway/GatewayServer';
import { isInitialized } from '../hardware/ServoController';
import { createController } from '../hardware/factory';
import { ConfigurationInvalidError, describeError } from '../hardware/ServoErrors';
import { configureLogger, logger } from '../utils/logger';

dotenv.config();

process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled Promise rejection: ${reason}`);
});

function loadConfig(configPath?: string): ConfigManager {
    try {
        return new ConfigManager(configPath);
    } catch (error) {
        logger.error(`Failed to load configuration: ${describeError(error)}`);
        if (error instanceof ConfigurationInvalidError) {
            for (const issue of error.issues) logger.error(`  ${issue}`);
        }
        process.exit(1);
    }
}

async function serve(configPath?: string, portOverride?: string) {
    const config = loadConfig(configPath);
    configureLogger(config.getLoggingConfig());

    const controller = createController(config);
    const outcome = await controller.initialize();
    if (!isInitialized(outcome)) {
        // Keep serving: POST /api/initialize can retry once the hardware is sorted out
        logger.warn(`Servos not initialized at startup (${outcome.status})`);
    }

    const gateway = new GatewayServer(controller, config, {
        port: portOverride !== undefined ? Number(portOverride) : undefined
    });
    await gateway.start();

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info(`Received ${signal}, stopping servos and shutting down`);
        try {
            await gateway.stop();
        } catch (error) {
            logger.error(`Error stopping gateway: ${describeError(error)}`);
        } finally {
            await controller.cleanup();
            process.exit(0);
        }
    };

    process.on('SIGINT', () => { void shutdown('SIGINT'); });
    process.on('SIGTERM', () => { void shutdown('SIGTERM'); });
}

const program = new Command();

program
    .name('servo-arm')
    .description('REST API for the continuous rotation servos of a robot arm')
    .version('1.0.0');

program
    .command('serve')
    .description('Initialize the servos and start the REST API')
    .option('-c, --config <path>', 'Path to config.yaml')
    .option('-p, --port <port>', 'Override api.port')
    .action(async (options: { config?: string; port?: string }) => {
        await serve(options.config, options.port);
    });

program
    .command('config')
    .description('Print the validated configuration')
    .option('-c, --config <path>', 'Path to config.yaml')
    .action((options: { config?: string }) => {
        const config = loadConfig(options.config);
        console.log(yaml.stringify(config.toJSON()));
    });

program
    .command('servos')
    .description('List configured servos and their pins')
    .option('-c, --config <path>', 'Path to config.yaml')
    .action((options: { config?: string }) => {
        const config = loadConfig(options.config);
        const servos = config.getServoDescriptors();
        if (servos.length === 0) {
            console.log('No servos configured.');
            return;
        }
        for (const servo of servos) {
            const channel = servo.channel !== undefined ? ` (pwm channel ${servo.channel})` : '';
            console.log(`${servo.id.padEnd(16)} ${servo.name.padEnd(16)} pin ${servo.pin}${channel}`);
        }
    });

if (require.main === module) {
    program.parseAsync(process.argv).catch((error) => {
        logger.error(`servo-arm: ${describeError(error)}`);
        process.exit(1);
    });
}
