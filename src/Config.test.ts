import { loadConfig } from "./Config";
import { ConfigError } from "./Errors";

describe('Config', () => {
    test('defaults', () => {
        const config = loadConfig({}, {});

        expect(config).toEqual({
            ok: true,
            value: {
                codepage: "cp437",
                maxChunkBytes: 65535,
                index: true,
                mapPlacement: "companion",
                mapFileName: "UNICODE.MAP"
            }
        });
    });

    test('reads AMB_* variables', () => {
        const config = loadConfig({}, {
            AMB_TITLE: "Field Manual",
            AMB_CODEPAGE: "850",
            AMB_MAX_CHUNK_BYTES: "4096",
            AMB_INDEX: "off",
            AMB_MAP_PLACEMENT: "embedded",
            AMB_MAP_FILE: "CP850.MAP",
            UNRELATED: "ignored",
        });

        expect(config.ok).toBe(true);
        if (!config.ok) return;
        expect(config.value).toEqual({
            title: "Field Manual",
            codepage: "850",
            maxChunkBytes: 4096,
            index: false,
            mapPlacement: "embedded",
            mapFileName: "CP850.MAP"
        });
    });

    test('overrides win over the environment and blank variables are ignored', () => {
        const config = loadConfig({ codepage: "kam", index: true }, { AMB_CODEPAGE: "852", AMB_INDEX: "no", AMB_TITLE: "  " });

        expect(config.ok).toBe(true);
        if (!config.ok) return;
        expect(config.value.codepage).toBe("kam");
        expect(config.value.index).toBe(true);
        expect(config.value.title).toBeUndefined();
    });

    test('invalid values are reported', () => {
        const too_small = loadConfig({}, { AMB_MAX_CHUNK_BYTES: "10" });
        expect(too_small.ok).toBe(false);
        if (!too_small.ok) {
            expect(too_small.error).toBeInstanceOf(ConfigError);
            expect(too_small.error.message).toBe("Invalid configuration: maxChunkBytes: Number must be greater than or equal to 29");
        }

        const bad_flag = loadConfig({}, { AMB_INDEX: "maybe" });
        expect(bad_flag.ok).toBe(false);
        if (!bad_flag.ok) expect(bad_flag.error.message).toBe("Invalid configuration: index: Expected boolean, received string");
    });

    test('the map file name must be a bare 8.3 name', () => {
        for (const name of ["../X.MAP", "maps/X.MAP", "LONGERNAME.MAP", "X.LONG"]) {
            const config = loadConfig({ mapFileName: name }, {});
            expect(config.ok).toBe(false);
            if (!config.ok) expect(config.error.message).toBe("Invalid configuration: mapFileName: must be an 8.3 file name without a directory");
        }

        const plain = loadConfig({}, { AMB_MAP_FILE: "cp850.map" });
        expect(plain.ok && plain.value.mapFileName).toBe("cp850.map");
    });
});
