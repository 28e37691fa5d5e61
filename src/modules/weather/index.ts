/**
 * @fileoverview Public exports for the Weather module.
 * @module modules/weather
 * @version 1.0.0
 */

export {
    decodeMetar,
    decodeWind,
    decodeVisibility,
    decodeCeiling,
    decodeTemperatures,
    decodePressure,
    formatMetarReport,
} from './MetarDecoder';
export { WeatherClient, extractReportLine } from './WeatherClient';
export type { IWeatherClient, WeatherClientConfig } from './interfaces';
export type { DecodedMetar, MetarCache, MetarReport } from './types';
export { UNAVAILABLE, METAR_PLACEHOLDER, DEFAULT_METAR_ENDPOINT } from './constants';
