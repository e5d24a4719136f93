/**
 * Interpreter-side diagnostic scripts, passed to `python3 -c`. Each prints one JSON
 * document on stdout; a failed check exits 2.
 */

export const PYTHON_INFO_SCRIPT = `
import json, sys
print(json.dumps({
    "python_version": sys.version.split(" (", 1)[0],
    "executable": sys.executable,
    "prefix": sys.prefix,
    "base_prefix": getattr(sys, "base_prefix", None),
    "platform": sys.platform,
}))
`;

export const PACKAGE_INFO_SCRIPT = `
import importlib, json, os, sys
pkg = sys.argv[1]
try:
    mod = importlib.import_module(pkg)
    version = None
    dist_info = None
    try:
        import importlib.metadata as md
        try:
            version = md.version(pkg)
            dist = md.distribution(pkg)
            for f in dist.files or []:
                if str(f).endswith("METADATA"):
                    dist_info = os.path.dirname(os.fspath(dist.locate_file(f)))
                    break
        except Exception:
            pass
    except Exception:
        pass
    if version is None:
        version = getattr(mod, "__version__", None)
    print(json.dumps({
        "package": pkg,
        "version": version,
        "module_file": getattr(mod, "__file__", None),
        "dist_info": dist_info,
    }))
except Exception as e:
    print(json.dumps({"error": str(e)}))
    sys.exit(2)
`;

export const CHECK_STACK_SCRIPT = `
import importlib, json, sys
out = {"ok": False, "mlx": None, "mlx_lm": None, "error": None}
def describe(mod):
    return {"version": getattr(mod, "__version__", None), "file": getattr(mod, "__file__", None)}
try:
    out["mlx"] = describe(importlib.import_module("mlx"))
except Exception as e:
    out["error"] = f"import mlx failed: {e}"
    print(json.dumps(out))
    sys.exit(2)
try:
    out["mlx_lm"] = describe(importlib.import_module("mlx_lm"))
except Exception as e:
    out["error"] = f"import mlx_lm failed: {e}"
    print(json.dumps(out))
    sys.exit(2)
out["ok"] = True
print(json.dumps(out))
`;
