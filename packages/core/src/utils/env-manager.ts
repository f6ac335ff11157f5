import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export class EnvManager {
    private readonly envFilePath: string;

    constructor(envFilePath?: string) {
        this.envFilePath = envFilePath ?? path.join(os.homedir(), '.sheetsentry', '.env');
    }

    public getEnvFilePath(): string {
        return this.envFilePath;
    }

    private readEnvFile(): Map<string, string> {
        const values = new Map<string, string>();
        if (!fs.existsSync(this.envFilePath)) {
            return values;
        }

        try {
            const content = fs.readFileSync(this.envFilePath, 'utf8');
            for (const rawLine of content.split(/\r?\n/)) {
                const line = rawLine.trim();
                if (!line || line.startsWith('#')) {
                    continue;
                }
                const separator = line.indexOf('=');
                if (separator <= 0) {
                    continue;
                }
                const key = line.slice(0, separator).trim();
                let value = line.slice(separator + 1).trim();
                if (value.length >= 2 && ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))) {
                    value = value.slice(1, -1);
                }
                values.set(key, value);
            }
        } catch (error) {
            console.warn(`[ENV] Failed to read ${this.envFilePath}:`, error);
        }
        return values;
    }

    /**
     * Process environment first, then the user's env file.
     */
    public get(name: string): string | undefined {
        const fromProcess = process.env[name];
        if (fromProcess !== undefined && fromProcess !== '') {
            return fromProcess;
        }
        return this.readEnvFile().get(name);
    }

    /** Append or replace one variable in the env file. */
    public set(name: string, value: string): void {
        const lines = fs.existsSync(this.envFilePath)
            ? fs.readFileSync(this.envFilePath, 'utf8').split(/\r?\n/).filter((line) => line.length > 0)
            : [];
        const prefix = `${name}=`;
        const next = lines.filter((line) => !line.trim().startsWith(prefix));
        next.push(`${name}=${value}`);

        fs.mkdirSync(path.dirname(this.envFilePath), { recursive: true });
        fs.writeFileSync(this.envFilePath, `${next.join('\n')}\n`, 'utf8');
    }
}

export const envManager = new EnvManager();
