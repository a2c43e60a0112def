// Vehicle categories served by the monitor feed
export type VehicleType = "Tram" | "Metro" | "CityBus" | "NightBus";

export type Line = Readonly<{
    vehicleType: VehicleType;
    name: string;
}>;

export type Departure = Readonly<{
    line: Line;
    destinationName: string;
    stationName: string;
    timePlanned: Date;
    timeReal?: Date;
    countdownMinutes: number; // May be negative when the vehicle is overdue
}>;

export type TrafficNote = Readonly<{
    title: string;
    description: string;
    priority?: string;
}>;

export function createLine(vehicleType: VehicleType, name: string): Line {
    return Object.freeze({ vehicleType, name });
}

export function createDeparture(fields: Departure): Departure {
    return Object.freeze({ ...fields });
}

export function isSameLine(a: Line, b: Line): boolean {
    return a.vehicleType === b.vehicleType && a.name === b.name;
}

/**
 * Identity of a departure: line, destination, station and planned time.
 * Countdown and real time change between fetches and are ignored.
 */
export function isSameDeparture(a: Departure, b: Departure): boolean {
    return (
        isSameLine(a.line, b.line) &&
        a.destinationName === b.destinationName &&
        a.stationName === b.stationName &&
        a.timePlanned.getTime() === b.timePlanned.getTime()
    );
}

export function compareDepartures(a: Departure, b: Departure): number {
    return a.countdownMinutes - b.countdownMinutes;
}

/**
 * Returns a new array ordered by countdown. Array#sort is stable, so equal
 * countdowns keep their input order.
 */
export function sortDepartures(departures: readonly Departure[]): Departure[] {
    return [...departures].sort(compareDepartures);
}

/**
 * The time shown on the board: the realtime estimate when the feed has one.
 */
export function getDisplayTime(departure: Departure): Date {
    return departure.timeReal ?? departure.timePlanned;
}
