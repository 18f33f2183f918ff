import { Injectable, ProviderScope } from "@tsed/di";
import { CatalogConfig, loadConfig } from "../config";

@Injectable({
  scope: ProviderScope.SINGLETON
})
export class ConfigService {
    private settings: CatalogConfig = loadConfig();

    get<K extends keyof CatalogConfig>(key: K): CatalogConfig[K] {
        return this.settings[key];
    }

    merge(overrides: Partial<CatalogConfig>): void {
        this.settings = { ...this.settings, ...overrides };
    }
}
