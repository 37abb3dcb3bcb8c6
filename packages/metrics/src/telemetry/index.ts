// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { MetricsTracer } from './otel.js';
export type { OTelSpanLike, OTelTracerLike, MetricsOTelConfig } from './otel.js';
