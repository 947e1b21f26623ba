import {HashMap, Option, Vector} from "prelude-ts";
import {DateTime} from 'luxon';

export module Helper {

    export const reportDateFormat = 'yyyy-MM-dd';

    export function formatReportDate(now: DateTime): string {
        return now.toFormat(reportDateFormat);
    }

    // "a@x.com, b@y.com,," -> ["a@x.com", "b@y.com"]
    export function splitAddressList(value: string | undefined): string[] {
        return Vector.ofIterable((value ?? '').split(','))
            .map(x => x.trim())
            .filter(x => x.length > 0)
            .toArray();
    }

    // tracker values are only trusted as text when they are scalars
    export function textOf(value: unknown): Option<string> {
        if (typeof value === 'string') {
            return Option.of(value);
        }
        if (typeof value === 'number' || typeof value === 'boolean') {
            return Option.of(String(value));
        }
        return Option.none();
    }

    // reads `record[key]` when record is an object, e.g. fields.reporter.displayName
    export function property(record: unknown, key: string): unknown {
        if (typeof record !== 'object' || record === null) {
            return undefined;
        }
        return Object.getOwnPropertyDescriptor(record, key)?.value;
    }

    export function trimTrailingSlashes(url: string): string {
        return url.replace(/\/+$/, '');
    }

    // "HIGH" -> "High"
    export function capitalize(value: string): string {
        return value.length === 0 ? value : value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
    }

    export interface CommandLine {
        command: Option<string>;
        options: HashMap<string, string>;
    }

    // <command> [--name value]... ; a flag without a value is stored as ''
    export function parseCommandLine(args: string[]): CommandLine {
        let options = HashMap.empty<string, string>();
        let command: Option<string> = Option.none();
        let i = 0;
        while (i < args.length) {
            const arg = args[i];
            if (arg.startsWith('--')) {
                const next = Option.ofNullable(args[i + 1]).filter(x => !x.startsWith('--'));
                options = options.put(arg.substring(2), next.getOrElse(''));
                i += next.isSome() ? 2 : 1;
            }
            else {
                if (command.isNone()) {
                    command = Option.of(arg);
                }
                i += 1;
            }
        }
        return {command, options};
    }
}
