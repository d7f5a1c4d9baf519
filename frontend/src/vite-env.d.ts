/// <reference types="vite/client" />

interface ImportMetaEnv {
    readonly VITE_MAX_SEQUENCE_LENGTH?: string;
    readonly VITE_MAX_EXPANSION_WORK?: string;
    readonly VITE_ANIMATION_TIME_SCALE?: string;
}

interface ImportMeta {
    readonly env: ImportMetaEnv;
}
