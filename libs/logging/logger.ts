import pino from "pino";
import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";
import { RequestContext } from "../context/requestContext.js";

/**
 * Request id and origin of the active request scope, read at log time so that
 * loggers created at startup still tag lines written while serving a request.
 */
export function requestScopeFields(): Record<string, string> {
    const scope = RequestContext.current();
    if (!scope) {
        return {};
    }
    return { requestId: scope.requestId, origin: scope.origin };
}

export function buildLoggerOptions(level: string = process.env.LOG_LEVEL ?? "info"): pino.LoggerOptions {
    return {
        level,
        base: {
            system: "checkout-relay"
        },
        redact: {
            paths: REDACT_KEYS,
            censor: REDACT_CENSOR
        },
        mixin: requestScopeFields
    };
}

export const logger = pino(buildLoggerOptions());

export type Logger = typeof logger;

/**
 * Returns a child logger for a component. Request fields come from the root mixin.
 */
export function getComponentLogger(component: string): Logger {
    return logger.child({ component });
}

/**
 * Masks a phone number for log lines: keeps the first four and last two digits.
 */
export function maskPhone(phoneNumber: string): string {
    if (phoneNumber.length <= 6) {
        return '*'.repeat(phoneNumber.length);
    }
    return `${phoneNumber.slice(0, 4)}${'*'.repeat(phoneNumber.length - 6)}${phoneNumber.slice(-2)}`;
}
