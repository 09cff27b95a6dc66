export interface DisplayGeometry {
    x: number;
    y: number;
    width: number;
    height: number;
}

/**
 * Lists the attached displays. The first entry is the primary display.
 * Implementations: SingleDisplayProvider, StaticDisplayProvider
 */
export interface IDisplayProvider {
    listDisplays(): DisplayGeometry[];
}

/**
 * Used when nothing better is known: one 800x600 display at the origin.
 */
export class SingleDisplayProvider implements IDisplayProvider {
    listDisplays(): DisplayGeometry[] {
        return [{ x: 0, y: 0, width: 800, height: 600 }];
    }
}

export class StaticDisplayProvider implements IDisplayProvider {
    constructor(private readonly displays: DisplayGeometry[]) {
        if (displays.length === 0) {
            throw new Error('StaticDisplayProvider requires at least one display');
        }
    }

    listDisplays(): DisplayGeometry[] {
        return this.displays.map((display) => ({ ...display }));
    }
}
