/**
 * @fileoverview METAR fetcher.
 * Fetches a raw report once per airport, caches it in the injected cache, and
 * falls back to a placeholder string on any failure.
 * @module modules/weather/WeatherClient
 * @version 1.0.0
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { ILogger } from '../../utils/interfaces';
import {
    DEFAULT_METAR_ENDPOINT,
    DEFAULT_REQUEST_TIMEOUT_MS,
    METAR_PLACEHOLDER,
} from './constants';
import type { IWeatherClient, WeatherClientConfig } from './interfaces';
import { decodeMetar } from './MetarDecoder';
import type { MetarCache, MetarReport } from './types';

/**
 * First non-empty line of a raw-format response.
 */
export function extractReportLine(body: unknown): string | null {
    if (typeof body !== 'string') {
        return null;
    }
    const line = body
        .split(/\r?\n/)
        .map((l) => l.trim())
        .find((l) => l.length > 0);
    return line ?? null;
}

/**
 * WeatherClient implementation backed by axios.
 * @implements {IWeatherClient}
 */
export class WeatherClient implements IWeatherClient {
    private readonly _endpoint: string;
    private readonly _http: Pick<AxiosInstance, 'get'>;
    private readonly _cache: MetarCache;
    private readonly _logger: Pick<ILogger, 'debug' | 'warn'>;

    constructor(config: WeatherClientConfig = {}) {
        this._endpoint = config.endpoint ?? DEFAULT_METAR_ENDPOINT;
        this._http = config.http ?? axios.create({
            timeout: config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
            responseType: 'text',
        });
        this._cache = config.cache ?? new Map<string, string>();
        this._logger = config.logger ?? {
            debug: (): void => undefined,
            warn: console.warn.bind(console),
        };
    }

    public async getReport(icao: string): Promise<MetarReport> {
        const key = icao.trim().toUpperCase();

        const cached = this._cache.get(key);
        if (cached !== undefined) {
            this._logger.debug(`[WeatherClient] Cache hit for ${key}`);
            return this._toReport(key, cached, true);
        }

        try {
            const response = await this._http.get<string>(this._endpoint, {
                params: { ids: key, format: 'raw' },
            });
            const line = extractReportLine(response.data);
            if (line === null) {
                this._logger.warn(`[WeatherClient] Empty METAR response for ${key}`);
                return this._toReport(key, METAR_PLACEHOLDER, false);
            }
            this._cache.set(key, line);
            return this._toReport(key, line, true);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this._logger.warn(`[WeatherClient] METAR fetch failed for ${key}: ${message}`);
            return this._toReport(key, METAR_PLACEHOLDER, false);
        }
    }

    private _toReport(icao: string, raw: string, available: boolean): MetarReport {
        return { icao, raw, available, decoded: decodeMetar(raw) };
    }
}
