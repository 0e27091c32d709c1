declare module "with-local-tmp-dir" {
    export type TmpDirCallback<T> = () => Promise<T>;

    export type TmpDirOptions = {
        dir?: string,
        prefix?: string,
        unsafeCleanup?: boolean,
    };

    /**
     * Creates a temporary directory inside `dir` (the working directory by default), changes into it for the
     * duration of the callback, then changes back and removes it.
     */
    function withLocalTmpDir<T>(options: TmpDirOptions, callback: TmpDirCallback<T>): Promise<T>;
    function withLocalTmpDir<T>(callback: TmpDirCallback<T>, options?: TmpDirOptions): Promise<T>;

    export default withLocalTmpDir;
}
