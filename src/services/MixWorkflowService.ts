import dayjs from 'dayjs';
import { PlaylistReaderService } from './PlaylistReaderService.js';
import { PlaylistWriterService, type WrittenFiles } from './PlaylistWriterService.js';
import { WeightedMixer, ConstraintPolicy, excludeSharedTracks } from '../engine/index.js';
import { Logger } from '../utils/logger.js';
import { config } from '../config/index.js';
import { ConfigurationError, ValidationError } from '../types/errors.js';
import type { CLIOptions, MixResult, Playlist } from '../types/index.js';

export interface MixRunSummary {
  result: MixResult;
  playlists: Playlist[];
  sharedExcluded: number;
  files?: WrittenFiles;
}

/** Parses repeated `id=weight` pairs. */
export function parseWeights(pairs: readonly string[] = []): Map<string, number> {
  const weights = new Map<string, number>();

  for (const pair of pairs) {
    const separator = pair.lastIndexOf('=');
    if (separator <= 0) {
      throw new ValidationError(`Invalid weight "${pair}", expected <playlist>=<weight>`);
    }

    const id = pair.slice(0, separator).trim();
    const raw = pair.slice(separator + 1).trim();
    const weight = Number(raw);
    if (!id || raw === '' || !Number.isFinite(weight)) {
      throw new ValidationError(`Invalid weight "${pair}", expected <playlist>=<weight>`);
    }
    if (weights.has(id)) {
      throw new ValidationError(`Weight for "${id}" given more than once`);
    }
    weights.set(id, weight);
  }

  return weights;
}

export class MixWorkflowService {
  constructor(
    private readonly reader = new PlaylistReaderService(),
    private readonly writer = new PlaylistWriterService(),
    private readonly mixer = new WeightedMixer()
  ) {}

  async run(files: readonly string[], options: CLIOptions): Promise<MixRunSummary> {
    const startedAt = dayjs();
    Logger.info('🎵 Starting playlist mix', { options });

    const dryRun = options.dryRun ?? config.dryRun;
    const policy = new ConstraintPolicy({
      maxPerArtist: options.maxPerArtist ?? config.mix.maxPerArtist,
      suppressDuplicates: options.allowDuplicates ? false : config.mix.suppressDuplicates,
    });

    const loaded = await this.loadPlaylists(files, options);
    const weighted = this.applyWeights(loaded.playlists, parseWeights(options.weight));

    let playlists = weighted;
    let sharedExcluded = 0;
    if (options.excludeShared) {
      const exclusion = excludeSharedTracks(weighted);
      playlists = exclusion.playlists;
      sharedExcluded = exclusion.shared.size;
      Logger.info(`🚫 Excluding ${sharedExcluded} tracks shared between playlists`);
    }

    Logger.info(`🎛️  Mixing ${playlists.length} playlists (${policy.describe()})`, {
      weights: Object.fromEntries(playlists.map((playlist) => [playlist.id, playlist.weight])),
    });

    const result = this.mixer.mix(playlists, policy, {
      randomize: options.randomize ?? false,
      seed: options.seed,
      maxOutputLength: options.maxLength ?? config.mix.maxOutputLength,
    });

    for (const warning of result.warnings) {
      Logger.warn(warning.message, { code: warning.code });
    }
    if (result.status === 'blocked') {
      Logger.warn('Every remaining playlist was blocked by the constraints, the mix ended early', {
        tracks: result.tracks.length,
      });
    }

    const summary: MixRunSummary = { result, playlists, sharedExcluded };

    if (dryRun) {
      Logger.info(`[DRY RUN] Would write ${result.tracks.length} tracks to ${options.output ?? config.paths.outputDir}`);
    } else {
      summary.files = await this.writer.writeMix(result.tracks, {
        outputDir: options.output ?? config.paths.outputDir,
        baseName: options.name,
        columns: loaded.columns,
        timestamp: options.timestamp,
      });
      Logger.info('✅ Mixed playlist written', { ...summary.files });
    }

    this.logFinalStats(result, dayjs().diff(startedAt, 'millisecond'));
    return summary;
  }

  async listPlaylists(inputDir?: string): Promise<string[]> {
    return this.reader.listPlaylistFiles(inputDir ?? config.paths.inputDir);
  }

  private async loadPlaylists(
    files: readonly string[],
    options: CLIOptions
  ): Promise<{ playlists: Playlist[]; columns?: string[] }> {
    const paths = files.length > 0 ? [...files] : await this.listPlaylists(options.input);
    if (paths.length === 0) {
      throw new ConfigurationError(`No playlists found in ${options.input ?? config.paths.inputDir}`);
    }

    const playlists: Playlist[] = [];
    let columns: string[] | undefined;

    for (const path of paths) {
      const { playlist, encoding } = await this.reader.readPlaylist(path, {
        slice: options.slice,
        maxTracks: options.maxTracks,
      });
      Logger.info(`📋 Loaded ${playlist.id}: ${playlist.tracks.length} tracks`, { encoding });
      columns = columns ?? playlist.columns;
      playlists.push(playlist);
    }

    return { playlists, columns };
  }

  private applyWeights(playlists: Playlist[], weights: Map<string, number>): Playlist[] {
    const known = new Set(playlists.map((playlist) => playlist.id));
    const unknown = [...weights.keys()].filter((id) => !known.has(id));
    if (unknown.length > 0) {
      throw new ValidationError(`Weights given for unknown playlists: ${unknown.join(', ')}`, {
        known: [...known],
      });
    }

    return playlists.map((playlist) => ({ ...playlist, weight: weights.get(playlist.id) ?? playlist.weight }));
  }

  private logFinalStats(result: MixResult, elapsedMs: number): void {
    Logger.info('📊 Mix completed', {
      tracks: result.tracks.length,
      status: result.status,
      rejectedDuplicates: result.rejections.duplicate,
      rejectedArtistCap: result.rejections.artist_cap,
      ...(result.seed !== undefined ? { seed: result.seed } : {}),
      elapsedMs,
    });

    for (const playlist of result.playlists) {
      Logger.debug(`Playlist ${playlist.playlistId}`, { ...playlist });
    }
  }
}
