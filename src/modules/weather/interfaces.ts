/**
 * @fileoverview Interface definitions for the Weather module.
 * @module modules/weather/interfaces
 * @version 1.0.0
 */

import type { AxiosInstance } from 'axios';
import type { ILogger } from '../../utils/interfaces';
import type { MetarCache, MetarReport } from './types';

/**
 * Fetches the current METAR for an airport.
 */
export interface IWeatherClient {
    /**
     * Fetch (once) and decode the report for an airport.
     * Never rejects: failures yield the placeholder with every field "Unavailable".
     */
    getReport(icao: string): Promise<MetarReport>;
}

/**
 * Configuration for WeatherClient constructor.
 */
export interface WeatherClientConfig {
    /** METAR endpoint taking `ids` and `format` query parameters */
    endpoint?: string;
    timeoutMs?: number;
    /** HTTP client; an axios instance is created when omitted */
    http?: Pick<AxiosInstance, 'get'>;
    /** Lazily populated report cache; a private Map when omitted */
    cache?: MetarCache;
    logger?: Pick<ILogger, 'debug' | 'warn'>;
}
