// noinspection JSUnusedGlobalSymbols

declare namespace NodeJS {
    export interface ProcessEnv {
        NODE_ENV?: 'development' | 'production' | 'test';

        FORCE_COUNTRY?: string;
        DISABLE_SPEED_TEST?: string;
        DEBUG?: string;
        LOG_LEVEL?: string;

        GEOLOCATION_SERVICES?: string;
        GEOLOCATION_TIMEOUT?: string;
        GEOLOCATION_RETRIES?: string;

        APT_SOURCES_LIST?: string;
        APT_SOURCES_LIST_DIR?: string;
        APT_LISTS_DIR?: string;
        APT_CONF_DIR?: string;
        APT_CONF_FILE?: string;
        APT_SHARE_DIR?: string;
        ETC_DIR?: string;
        BACKUP_DIR?: string;

        OS_RELEASE_FILE?: string;
        DEBIAN_VERSION_FILE?: string;

        APT_GET_BIN?: string;
        APT_CACHE_BIN?: string;
        APT_RETRIES?: string;
        APT_TIMEOUT?: string;

        APT_SOURCES?: string;

        SPEED_TEST_PACKAGE?: string;

        [key: `SPEED_TEST_PACKAGE_${ string }`]: string;
    }
}
