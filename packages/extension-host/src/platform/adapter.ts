/**
 * Platform adapter interface for loading and instantiating WebAssembly modules.
 *
 * Keeps filesystem and compile calls out of the container and registry so
 * tests can substitute a counting or failing adapter.
 */

export interface PlatformAdapter {
  /** Read and compile a .wasm module from the local filesystem. */
  loadModule(path: string): Promise<WebAssembly.Module>;

  /** Compile module bytes already in memory. */
  compile(bytes: Uint8Array): Promise<WebAssembly.Module>;

  /** Instantiate a module with the given import object. */
  instantiate(
    module: WebAssembly.Module,
    imports: WebAssembly.Imports,
  ): Promise<WebAssembly.Instance>;

  /**
   * Scan a directory for extension binaries.
   * Returns a map of extension id (file stem) → absolute .wasm path.
   */
  scanExtensions(dir: string): Promise<Map<string, string>>;
}
