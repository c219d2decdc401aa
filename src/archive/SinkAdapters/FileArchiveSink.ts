import fs from "node:fs/promises";
import path from "node:path";
import { uuidv7 } from "uuidv7";
import { ArchiveSink, Artifact, StagedArtifact } from "../ArchiveSink";

type PublishedArtifact = StagedArtifact & {
    backup?: string //where the file it replaced was moved to
}

//writes next to the target as .<name>.<uuidv7>.tmp, then renames into place
export class FileArchiveSink extends ArchiveSink
{
    async read(file: string) : Promise<Uint8Array | undefined>
    {
        try {
            return new Uint8Array(await fs.readFile(file));
        } catch (error) {
            if (isMissingFile(error)) return undefined;
            throw error;
        }
    }

    async stage_internal(artifact: Artifact) : Promise<StagedArtifact>
    {
        const staging = siblingPath(artifact.path, "tmp");

        await fs.mkdir(path.dirname(artifact.path), { recursive: true });
        try {
            await fs.writeFile(staging, artifact.data);
        } catch (error) {
            await fs.rm(staging, { force: true });
            throw error;
        }
        return { ...artifact, staging: staging };
    }

    /**
     * Existing files are moved aside before their replacement is renamed in.
     * If any rename fails, every artifact published so far is taken back and
     * the files it replaced are restored.
     */
    async publish_internal(staged: StagedArtifact[]) : Promise<void>
    {
        try {
            for (const artifact of staged) await assertReplaceable(artifact.path);
        } catch (error) {
            await this.discard_internal(staged);
            throw error;
        }

        const published : PublishedArtifact[] = [];
        for (const [index, artifact] of staged.entries()) {
            let backup : string | undefined;
            try {
                backup = await this.backup(artifact.path);
                await this.rename_internal(artifact.staging, artifact.path);
            } catch (error) {
                if (backup !== undefined) await this.rename_internal(backup, artifact.path);
                await this.rollback(published);
                await this.discard_internal(staged.slice(index));
                throw error;
            }
            published.push(backup === undefined ? artifact : { ...artifact, backup: backup });
        }

        await Promise.all(published.map(async (artifact) => {
            if (artifact.backup !== undefined) await fs.rm(artifact.backup, { force: true });
        }));
    }

    async discard_internal(staged: StagedArtifact[]) : Promise<void>
    {
        await Promise.all(staged.map(artifact => fs.rm(artifact.staging, { force: true })));
    }

    protected async rename_internal(from: string, to: string) : Promise<void>
    {
        await fs.rename(from, to);
    }

    private async backup(target: string) : Promise<string | undefined>
    {
        try {
            await fs.lstat(target);
        } catch (error) {
            if (isMissingFile(error)) return undefined;
            throw error;
        }

        const backup = siblingPath(target, "bak");
        await this.rename_internal(target, backup);
        return backup;
    }

    private async rollback(published: PublishedArtifact[]) : Promise<void>
    {
        for (const artifact of [...published].reverse()) {
            await fs.rm(artifact.path, { force: true });
            if (artifact.backup !== undefined) await this.rename_internal(artifact.backup, artifact.path);
        }
    }
}

//a hidden file beside target: .<name>.<uuidv7>.<extension>
function siblingPath(target: string, extension: string) : string
{
    return path.join(path.dirname(target), `.${path.basename(target)}.${uuidv7()}.${extension}`);
}

async function assertReplaceable(target: string) : Promise<void>
{
    try {
        const stats = await fs.lstat(target);
        if (stats.isDirectory()) throw new Error(`Cannot write '${target}', a directory is in the way`);
    } catch (error) {
        if (isMissingFile(error)) return;
        throw error;
    }
}

//fs errors from another realm fail instanceof Error, so only the shape is checked
function isMissingFile(error: unknown) : boolean
{
    return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
