import {existsSync, readFileSync} from "fs";
import path from "path";
import dotenv from "dotenv";
import {z} from "zod";

export type Logger = Pick<Console, "log" | "warn" | "error">;

export class ConfigurationException extends Error {
    public field: string | null;

    constructor(field: string | null, message: string) {
        super(field ? `Invalid configuration field ${field}: ${message}` : `Invalid configuration: ${message}`);
        this.field = field;
    }
}

export const BaseConfigSchema = z.object({
    numNodes: z.number().int().min(2),
    numFlows: z.number().int().min(0),
    // seconds
    epochDuration: z.number().positive(),
    appStartTime: z.number().min(0),
    // bits per second
    flowDataRate: z.number().positive(),
    packetSize: z.number().int().min(1).max(65507),
    basePort: z.number().int().min(1).max(65535),
    linkDataRate: z.number().positive(),
    linkDelay: z.number().min(0),
    queueCapacity: z.number().int().min(1),
    // percent
    linkErrorRate: z.number().min(0).max(100),
    network: z.string().ip({version: "v4"}),
    prefixLength: z.number().int().min(8).max(30),
    seed: z.number().int().min(0).max(0xffffffff),
    maxRedraws: z.number().int().min(0),
    outputPath: z.string().min(1),
    xlsxPath: z.string().min(1).optional(),
    provenance: z.enum(["assignment", "modulo"])
});

export const ConfigSchema = BaseConfigSchema.superRefine((config, ctx) => {
    if (config.appStartTime >= config.epochDuration)
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["appStartTime"],
            message: `must be lower than epochDuration (${config.epochDuration})`
        });

    if (config.numFlows > 0 && config.basePort + config.numFlows - 1 > 65535)
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["numFlows"],
            message: `${config.numFlows} ports starting at ${config.basePort} exceed 65535`
        });

    if (config.numNodes > 2 ** (32 - config.prefixLength) - 2)
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["numNodes"],
            message: `${config.numNodes} hosts do not fit in a /${config.prefixLength} network`
        });
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigKey = keyof Config;

export const DEFAULT_CONFIG: Config = {
    numNodes: 10,
    numFlows: 20,
    epochDuration: 10,
    appStartTime: 1,
    flowDataRate: 500_000,
    packetSize: 1024,
    basePort: 9000,
    linkDataRate: 100_000_000,
    linkDelay: 6.56e-6,
    queueCapacity: 100,
    linkErrorRate: 0,
    network: "10.1.1.0",
    prefixLength: 24,
    seed: 1,
    maxRedraws: 64,
    outputPath: "flow-report.csv",
    provenance: "assignment"
};

const STRING_FIELDS: ReadonlySet<string> = new Set(["network", "outputPath", "xlsxPath", "provenance"]);

export const ENV_PREFIX = "TRAFFIC_";

export function envName(key: string): string {
    return ENV_PREFIX + key.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toUpperCase();
}

function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
    let res: Record<string, unknown> = {};
    for (const key of Object.keys(BaseConfigSchema.shape)) {
        let value = env[envName(key)];
        if (value === undefined || value.trim() === "")
            continue;

        res[key] = STRING_FIELDS.has(key) ? value : Number(value);
    }

    return res;
}

function describe(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

function fromFile(file: string): Record<string, unknown> {
    let text: string;
    try {
        text = readFileSync(file, "utf8");
    } catch (e) {
        throw new ConfigurationException("config", `cannot read ${file}: ${describe(e)}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (e) {
        throw new ConfigurationException("config", `${file} is not valid JSON: ${describe(e)}`);
    }

    if (typeof parsed != "object" || parsed === null || Array.isArray(parsed))
        throw new ConfigurationException("config", `${file} must contain a JSON object`);

    return {...parsed};
}

export function parseConfig(input: unknown): Config {
    let result = ConfigSchema.safeParse(input);
    if (result.success)
        return result.data;

    let issue = result.error.issues[0];
    let field = issue.path.length ? issue.path.join(".") : null;
    let others = result.error.issues.length - 1;

    throw new ConfigurationException(field, issue.message + (others > 0 ? ` (and ${others} more issue(s))` : ""));
}

export type LoadConfigOptions = {
    env?: NodeJS.ProcessEnv,
    argv?: string[],
    cwd?: string
};

/**
 * Defaults, then the JSON file named by the first argument or TRAFFIC_CONFIG,
 * then TRAFFIC_* variables (a .env file in cwd is read first).
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
    let env = options.env ?? process.env;
    let cwd = options.cwd ?? process.cwd();

    // Variables already set win over .env, as with dotenv.config()
    let dotenvPath = path.join(cwd, ".env");
    if (existsSync(dotenvPath))
        env = {...dotenv.parse(readFileSync(dotenvPath)), ...env};

    let file = options.argv?.[0] ?? env[ENV_PREFIX + "CONFIG"];
    let fileValues = file ? fromFile(path.resolve(cwd, file)) : {};

    return parseConfig({...DEFAULT_CONFIG, ...fileValues, ...fromEnv(env)});
}
