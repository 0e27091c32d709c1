import fsExtra from "fs-extra";

function toPathExist(this: jest.MatcherContext, actual: unknown): jest.CustomMatcherResult {
    if (typeof actual !== 'string') {
        throw new TypeError('The parameter must be a string!');
    }

    const pass = fsExtra.pathExistsSync(actual);
    if (pass) {
        return {
            message: () =>
                `expected ${ this.utils.printReceived(actual) } path not to exist`,
            pass: true,
        };
    } else {
        return {
            message: () =>
                `expected ${ this.utils.printReceived(actual) } path to exist`,
            pass: false,
        };
    }
}

expect.extend({
    toPathExist,
});

declare global {
    // eslint-disable-next-line @typescript-eslint/no-namespace
    namespace jest {
        // noinspection JSUnusedGlobalSymbols
        interface AsymmetricMatchers {
            toPathExist(): void;
        }

        // noinspection JSUnusedGlobalSymbols
        // eslint-disable-next-line @typescript-eslint/no-empty-object-type
        interface Matchers<R, T = {}> {
            toPathExist(): R;
        }
    }
}
