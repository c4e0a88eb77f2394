import { AppConfig } from '../config';
import { logger } from '../config/logger';
import { IntegrationService } from '../services/integrationService';
import { ConsoleReporter, paint } from './consoleReporter';
import { PromptSession } from './promptSession';

export interface OperatorLoopOptions {
    service: IntegrationService;
    config: Pick<AppConfig, 'usersApiUrl' | 'productsApiUrl' | 'riskThreshold'>;
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
    write?: (line: string) => void;
}

const INTEGER_INPUT = /^[+-]?\d+$/;

export const parseId = (raw: string): number | null => {
    const trimmed = raw.trim();
    return INTEGER_INPUT.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
};

export const headerLines = (config: OperatorLoopOptions['config']): string[] => {
    const rule = '='.repeat(80);
    return [
        rule,
        paint('INTEGRATION RISK VALIDATOR', 'bold', 'cyan'),
        rule,
        `Users    -> ${config.usersApiUrl}`,
        `Products -> ${config.productsApiUrl}`,
        `Block threshold = ${config.riskThreshold}`,
        rule
    ];
};

/**
 * Interactive loop: ask for a user id and a product id, validate the pair,
 * then ask whether to continue. Errors in one evaluation never end the loop.
 */
export const runOperatorLoop = async ({ service, config, input, output, write }: OperatorLoopOptions): Promise<number> => {
    const print = write ?? ((line: string) => { output.write(`${line}\n`); });
    const reporter = new ConsoleReporter(print);
    const session = new PromptSession(input, output);
    let evaluations = 0;

    headerLines(config).forEach(line => print(line));

    try {
        while (true) {
            const userAnswer = await session.ask('\nEnter the user ID (1-10): ');
            if (userAnswer === null) {
                break;
            }
            const userId = parseId(userAnswer);
            if (userId === null) {
                print(paint('Please enter valid numbers only!', 'yellow'));
                continue;
            }

            const productAnswer = await session.ask('Enter the product ID (1-20): ');
            if (productAnswer === null) {
                break;
            }
            const productId = parseId(productAnswer);
            if (productId === null) {
                print(paint('Please enter valid numbers only!', 'yellow'));
                continue;
            }

            try {
                await service.validateIntegration(userId, productId, [reporter]);
                evaluations++;
            } catch (error) {
                logger.error('Evaluation failed', { userId, productId, error: error instanceof Error ? error.message : String(error) });
                print(paint(`Evaluation failed: ${error instanceof Error ? error.message : String(error)}`, 'red'));
            }

            const again = await session.ask('\nValidate another pair? (y/n): ');
            if (again === null || again.trim().toLowerCase() !== 'y') {
                break;
            }
        }
    } finally {
        session.close();
    }

    print(paint('\nShutting down... goodbye!', 'cyan'));
    return evaluations;
};
