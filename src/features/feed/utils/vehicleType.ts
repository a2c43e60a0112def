import { UnknownVehicleCodeError } from "@core/domain/error";

import type { VehicleType } from "@core/domain/departure";

export const VEHICLE_TYPE_CODES: Readonly<Record<string, VehicleType>> = Object.freeze({
    ptTram: "Tram",
    ptMetro: "Metro",
    ptBusCity: "CityBus",
    ptBusNight: "NightBus",
});

/**
 * Maps a feed vehicle code (e.g. "ptTram") to its VehicleType.
 * There is no fallback type: an unmapped code means the feed format drifted.
 */
export function toVehicleType(code: string): VehicleType {
    if (!Object.prototype.hasOwnProperty.call(VEHICLE_TYPE_CODES, code)) {
        throw new UnknownVehicleCodeError(code);
    }
    return VEHICLE_TYPE_CODES[code];
}
