export type SayFn = (s: string) => void;
export type DbgFn = (s: string) => void;

let debugLogging = false;

export function setDebugLogging(enabled: boolean): void {
    debugLogging = enabled;
}

export function dbg(s: string) {
    if (debugLogging) {
        console.debug(s);
    }
}

export function say(s: string) {
    console.log(s);
}
