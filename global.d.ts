// Global type declarations for nima-assess

// Common file/path types
type ImagePath = string;
type ImageList = ReadonlyArray<ImagePath>;

// Pipeline step identifiers
type Step = "setup" | "assess" | "visualize";

// The two NIMA weight sets
type ModelType = "aesthetic" | "technical";

// What a command was asked to evaluate
type ModelSelection = ModelType | "both";

// Ten probabilities, bucket i holds P(score = i + 1)
type ScoreDistribution = number[];

// Distributions per model for one image
type ImageScores = Partial<Record<ModelType, ScoreDistribution>>;

// Results keyed by image file name
type ScoresByImage = Map<string, ImageScores>;
