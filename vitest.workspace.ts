export default ["packages/shared", "packages/adapter-telegram", "packages/control-plane"]
