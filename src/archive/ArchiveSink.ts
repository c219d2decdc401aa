import { PromisePool } from "@supercharge/promise-pool";

export type Artifact = {
    path: string,
    data: Uint8Array
}

//an artifact written somewhere it is not yet visible under its final path
export type StagedArtifact = Artifact & {
    staging: string
}

export abstract class ArchiveSink
{
    //an archive and its companion map at most
    MAX_CONCURRENT_WRITES = 2;

    /**
     * Writes every artifact or none. All artifacts are staged first, then
     * published; if staging any of them fails the staged ones are discarded
     * and the failure propagates. publish_internal takes back whatever it
     * already published before it rethrows.
     */
    async commit(artifacts: Artifact[]) : Promise<string[]>
    {
        if (artifacts.length === 0) throw new Error("No artifacts to commit");

        const { results, errors } = await PromisePool
        .withConcurrency(this.MAX_CONCURRENT_WRITES)
        .for(artifacts)
        .process(async (artifact) => await this.stage_internal(artifact));

        if (errors.length > 0) {
            await this.discard_internal(results);
            throw errors[0].raw;
        }

        //the first artifact is the archive, it becomes visible last
        const ordered = artifacts
            .map(artifact => results.find(staged => staged.path === artifact.path))
            .filter((staged): staged is StagedArtifact => staged !== undefined)
            .reverse();
        await this.publish_internal(ordered);

        return artifacts.map(artifact => artifact.path);
    }

    abstract read(path: string) : Promise<Uint8Array | undefined>;

    abstract stage_internal(artifact: Artifact) : Promise<StagedArtifact>;
    abstract publish_internal(staged: StagedArtifact[]) : Promise<void>;
    abstract discard_internal(staged: StagedArtifact[]) : Promise<void>;
}
