/**
 * Test helpers barrel export
 *
 * @example
 * import { withTempDir, writeZip, testLayout } from "@/tests/helpers"
 */

export * from "@/tests/helpers/archives"
export * from "@/tests/helpers/assertions"
export * from "@/tests/helpers/branded"
export * from "@/tests/helpers/fs"
export * from "@/tests/helpers/layout"
