import { IntegrationEvent, IntegrationReporter } from '../services/reporter';

const colors = {
    green: '\x1b[92m',
    red: '\x1b[91m',
    yellow: '\x1b[93m',
    cyan: '\x1b[96m',
    bold: '\x1b[1m',
    reset: '\x1b[0m'
};

export type Color = keyof typeof colors;

export const paint = (text: string, ...styles: Color[]): string =>
    `${styles.map(style => colors[style]).join('')}${text}${colors.reset}`;

/** Renders pipeline events for an operator at a terminal. */
export class ConsoleReporter implements IntegrationReporter {
    constructor(private readonly write: (line: string) => void = line => console.log(line)) {}

    report(event: IntegrationEvent): void {
        for (const line of this.render(event)) {
            this.write(line);
        }
    }

    render(event: IntegrationEvent): string[] {
        switch (event.type) {
            case 'fetch.started':
                return event.resource === 'user'
                    ? [paint(`\nLooking up user ID=${event.id}...`, 'cyan')]
                    : [paint(`Looking up product ID=${event.id}...`, 'cyan')];

            case 'fetch.failed':
                if (event.failure.kind === 'timeout') {
                    return [paint(`Timeout (${event.failure.attempt}/${event.retriesAllowed}), retrying...`, 'yellow')];
                }
                return [paint(`Request error: ${event.failure.message}`, 'red')];

            case 'record.missing':
                return [paint(event.resource === 'user' ? 'User not found.' : 'Product not found.', 'red')];

            case 'assessment.produced': {
                const { user, product, assessment, threshold } = event;
                const lines = [
                    `\n${paint('User:', 'bold', 'green')} ${user.name} | ${user.email}`,
                    `${paint('City:', 'cyan')} ${user.city}`,
                    `\n${paint('Product:', 'bold', 'green')} ${product.title}`,
                    `${paint('Price:', 'cyan')} ${product.price} | Category: ${product.category || '-'}`,
                    `\n${paint(`Risk score: ${assessment.score}/100`, 'yellow')}`
                ];

                if (assessment.reasons.length > 0) {
                    lines.push(paint(`Reasons: ${assessment.reasons.join(', ')}`, 'yellow'));
                }

                lines.push(assessment.blocked
                    ? paint(`\nIntegration BLOCKED: risk at or above the threshold (${threshold}).`, 'red')
                    : paint('\nIntegration authorized: saving result.', 'green'));

                return lines;
            }

            case 'result.saved':
                return [paint(`Result saved to ${event.result.location}`, 'cyan')];
        }
    }
}
