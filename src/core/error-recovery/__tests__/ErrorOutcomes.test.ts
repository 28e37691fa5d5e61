import { AppErrorCode } from '../../../types/app-errors';
import { getErrorOutcome } from '../ErrorOutcomes';

describe('getErrorOutcome', () => {
    it('ends quietly with 0 for NO_MATCH_SELECTED', () => {
        expect(getErrorOutcome(AppErrorCode.NO_MATCH_SELECTED)).toEqual({
            exitCode: 0,
            hint: null,
            quiet: true,
        });
    });

    it.each([
        AppErrorCode.CATALOG_NOT_FOUND,
        AppErrorCode.CATALOG_EMPTY,
        AppErrorCode.NO_CHANNELS_FOR_REGION,
        AppErrorCode.ICAO_NOT_FOUND,
    ])('exits with 1 for %s', (code) => {
        expect(getErrorOutcome(code)).toMatchObject({ exitCode: 1, quiet: false });
    });

    it('points at the catalog setting when the catalog is missing', () => {
        expect(getErrorOutcome(AppErrorCode.CATALOG_NOT_FOUND).hint).toBe(
            'Pass --catalog <path> or set ATC_TUNER_CATALOG'
        );
    });

    it('ends quietly with 130 for SESSION_INTERRUPTED', () => {
        expect(getErrorOutcome(AppErrorCode.SESSION_INTERRUPTED)).toEqual({
            exitCode: 130,
            hint: null,
            quiet: true,
        });
    });

    it('exits with 2 for AMBIGUOUS_FUZZY_MATCH', () => {
        expect(getErrorOutcome(AppErrorCode.AMBIGUOUS_FUZZY_MATCH).exitCode).toBe(2);
    });

    it('exits with 1 for unknown errors', () => {
        expect(getErrorOutcome(null)).toEqual({ exitCode: 1, hint: null, quiet: false });
        expect(getErrorOutcome(AppErrorCode.UNKNOWN).exitCode).toBe(1);
    });
});
