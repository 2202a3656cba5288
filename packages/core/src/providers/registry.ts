import type { ModelClient } from "./model-client.js";

export interface ModelClientOptions {
    model: string;
    apiKey?: string;
    baseURL?: string;
    temperature?: number;
    maxOutputTokens?: number;
}

export interface ModelClientRegistration {
    name: string;
    create: (options: ModelClientOptions) => ModelClient;
    modelPatterns?: RegExp[];
}

export class ModelClientRegistry {
    private registrations = new Map<string, ModelClientRegistration>();

    register(registration: ModelClientRegistration): void {
        this.registrations.set(registration.name, registration);
    }

    has(name: string): boolean {
        return this.registrations.has(name);
    }

    list(): ModelClientRegistration[] {
        return Array.from(this.registrations.values());
    }

    create(name: string, options: ModelClientOptions): ModelClient {
        const registration = this.registrations.get(name);
        if (!registration) {
            throw new Error(`Model provider not registered: ${name}`);
        }
        return registration.create(options);
    }

    resolveProviderNameForModel(model: string): string | null {
        for (const registration of this.registrations.values()) {
            if (registration.modelPatterns?.some((pattern) => pattern.test(model))) {
                return registration.name;
            }
        }
        return null;
    }
}
